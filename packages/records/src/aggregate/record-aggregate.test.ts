// Tests for RecordAggregate

import { describe, it, expect } from 'vitest';
import type {
  Identifier,
  PremisAgent,
  PremisEvent,
  PremisObject,
  PremisRights,
} from '@premis-kit/protocol';
import {
  ConfigurationError,
  DuplicateIdentifierError,
  RecordNotFoundError,
  createCapturingLogger,
  createIdentifier,
  parseXml,
} from '@premis-kit/protocol';
import { RecordAggregate, createRecordAggregate } from './record-aggregate.js';
import { createInMemoryReader } from '../document/fs.js';
import type { DocumentImporter } from '../document/types.js';

// --- Test Fixtures ---

const id = createIdentifier;

function createTestEvent(value: string, eventType = 'ingestion'): PremisEvent {
  return {
    kind: 'event',
    eventIdentifier: id('local', value),
    eventType,
    eventDateTime: '2024-03-01T10:00:00Z',
    outcomes: [],
    linkingAgents: [],
    linkingObjects: [],
  };
}

function createTestObject(...identifiers: Identifier[]): PremisObject {
  return {
    kind: 'object',
    category: 'file',
    objectIdentifiers: identifiers,
    characteristics: [],
    storage: [],
    linkingEventIdentifiers: [],
    linkingRightsStatementIdentifiers: [],
  };
}

function createTestAgent(value: string, name = 'Test Agent'): PremisAgent {
  return {
    kind: 'agent',
    agentIdentifiers: [id('local', value)],
    names: [name],
    notes: [],
    linkingEventIdentifiers: [],
    linkingRightsStatementIdentifiers: [],
  };
}

function createTestRights(...values: string[]): PremisRights {
  return {
    kind: 'rights',
    statements: values.map((value) => ({
      identifier: id('local', value),
      basis: 'license',
      granted: [],
      linkingObjectIdentifiers: [],
      linkingAgents: [],
    })),
  };
}

function createFullAggregate(): RecordAggregate {
  return RecordAggregate.fromRecords({
    objects: [createTestObject(id('local', 'O1'))],
    events: [createTestEvent('E1'), createTestEvent('E2', 'fixity check')],
    agents: [createTestAgent('A1')],
    rights: [createTestRights('R1', 'R2')],
  });
}

/**
 * Importer stub that records which kinds were requested, in order
 */
function createRecordingImporter(entries: {
  events?: PremisEvent[];
  agents?: PremisAgent[];
  rights?: PremisRights[];
  objects?: PremisObject[];
}): DocumentImporter & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    findEvents() {
      calls.push('events');
      return entries.events ?? [];
    },
    findAgents() {
      calls.push('agents');
      return entries.agents ?? [];
    },
    findRights() {
      calls.push('rights');
      return entries.rights ?? [];
    },
    findObjects() {
      calls.push('objects');
      return entries.objects ?? [];
    },
  };
}

// --- Tests ---

describe('RecordAggregate', () => {
  describe('fromRecords', () => {
    it('should seed every kind from its sequence', () => {
      const aggregate = createFullAggregate();

      expect(aggregate.counts()).toEqual({ object: 1, event: 2, agent: 1, rights: 1 });
      expect(aggregate.size).toBe(5);
      expect(aggregate.filepath).toBeNull();
    });

    it('should reject a seed with no entries', () => {
      expect(() => RecordAggregate.fromRecords({})).toThrow(ConfigurationError);
      expect(() => RecordAggregate.fromRecords({ events: [], objects: [] })).toThrow(
        ConfigurationError
      );
    });

    it('should reject duplicate events in the seed', () => {
      expect(() =>
        RecordAggregate.fromRecords({
          events: [createTestEvent('E1'), createTestEvent('E1', 'fixity check')],
        })
      ).toThrow(DuplicateIdentifierError);
    });

    it('should allow the same identifier in different kinds', () => {
      const aggregate = RecordAggregate.fromRecords({
        objects: [createTestObject(id('local', 'X1'))],
        events: [createTestEvent('X1')],
        agents: [createTestAgent('X1')],
      });

      expect(aggregate.size).toBe(3);
    });
  });

  describe('createRecordAggregate', () => {
    it('should reject neither entries nor a path', async () => {
      await expect(createRecordAggregate({})).rejects.toThrow(ConfigurationError);
    });

    it('should reject both entries and a path', async () => {
      await expect(
        createRecordAggregate({ events: [createTestEvent('E1')], fromPath: 'premis.xml' })
      ).rejects.toThrow(ConfigurationError);
    });

    it('should treat an empty path as missing', async () => {
      await expect(createRecordAggregate({ fromPath: '' })).rejects.toThrow(ConfigurationError);
    });

    it('should build from entries', async () => {
      const aggregate = await createRecordAggregate({ events: [createTestEvent('E1')] });
      expect(aggregate.listEvents()).toHaveLength(1);
    });

    it('should build from a document and keep its path', async () => {
      const reader = createInMemoryReader(
        new Map([
          [
            'premis.xml',
            `<premis xmlns="http://www.loc.gov/premis/v3" version="3.0">
              <event>
                <eventIdentifier>
                  <eventIdentifierType>local</eventIdentifierType>
                  <eventIdentifierValue>E1</eventIdentifierValue>
                </eventIdentifier>
                <eventType>ingestion</eventType>
                <eventDateTime>2024-03-01T10:00:00Z</eventDateTime>
              </event>
            </premis>`,
          ],
        ])
      );

      const aggregate = await createRecordAggregate({ fromPath: 'premis.xml' }, { reader });

      expect(aggregate.filepath).toBe('premis.xml');
      expect(aggregate.listEvents()).toEqual([createTestEvent('E1')]);
    });

    it('should report a missing document', async () => {
      const reader = createInMemoryReader(new Map());
      await expect(createRecordAggregate({ fromPath: 'missing.xml' }, { reader })).rejects.toThrow(
        'Document not found: missing.xml'
      );
    });
  });

  describe('adding and lookup', () => {
    it('should reject a second event with the same identifier and accept a new one', () => {
      const aggregate = RecordAggregate.fromRecords({ events: [createTestEvent('E1')] });

      expect(() => aggregate.addEvent(createTestEvent('E1'))).toThrow(DuplicateIdentifierError);
      expect(aggregate.listEvents()).toHaveLength(1);

      aggregate.addEvent(createTestEvent('E2'));
      expect(aggregate.listEvents()).toHaveLength(2);
    });

    it('should list events in the order they were added', () => {
      const aggregate = RecordAggregate.fromRecords({ events: [createTestEvent('E1')] });
      aggregate.addEvent(createTestEvent('E3'));
      aggregate.addEvent(createTestEvent('E2'));

      expect(aggregate.listEvents().map((event) => event.eventIdentifier.value)).toEqual([
        'E1',
        'E3',
        'E2',
      ]);
    });

    it('should find a rights entry by either statement identifier', () => {
      const rights = createTestRights('R1', 'R2');
      const aggregate = RecordAggregate.fromRecords({ rights: [rights] });

      expect(aggregate.getRights(id('local', 'R1'))).toBe(rights);
      expect(aggregate.getRights(id('local', 'R2'))).toBe(rights);
    });

    it('should find an object by any of its identifiers', () => {
      const object = createTestObject(id('local', 'O1'), id('uuid', 'obj-0001'));
      const aggregate = RecordAggregate.fromRecords({ objects: [object] });

      expect(aggregate.getObject(id('local', 'O1'))).toEqual(aggregate.getObject(id('uuid', 'obj-0001')));
      expect(aggregate.requireObject(id('uuid', 'obj-0001'))).toBe(object);
    });

    it('should keep kinds apart when looking up', () => {
      const aggregate = createFullAggregate();

      expect(aggregate.getAgent(id('local', 'A1'))).toEqual(createTestAgent('A1'));
      expect(aggregate.getAgent(id('local', 'E1'))).toBeNull();
      expect(aggregate.getEvent(id('local', 'A1'))).toBeNull();
    });

    it('should return null or throw for a miss, per method', () => {
      const aggregate = createFullAggregate();

      expect(aggregate.getEvent(id('local', 'E9'))).toBeNull();
      expect(aggregate.getObject(id('local', 'O9'))).toBeNull();
      expect(() => aggregate.requireEvent(id('local', 'E9'))).toThrow(RecordNotFoundError);
      expect(() => aggregate.requireAgent(id('local', 'A9'))).toThrow(RecordNotFoundError);
      expect(() => aggregate.requireRights(id('local', 'R9'))).toThrow(RecordNotFoundError);
    });

    it('should not deduplicate equal entries added under new identifiers', () => {
      const aggregate = RecordAggregate.fromRecords({ agents: [createTestAgent('A1', 'Same')] });
      aggregate.addAgent(createTestAgent('A2', 'Same'));

      expect(aggregate.listAgents()).toHaveLength(2);
    });
  });

  describe('enumeration', () => {
    it('should yield objects, events, rights, then agents', () => {
      const aggregate = createFullAggregate();

      expect([...aggregate].map((record) => record.kind)).toEqual([
        'object',
        'event',
        'event',
        'rights',
        'agent',
      ]);
    });
  });

  describe('equals', () => {
    it('should ignore insertion order', () => {
      const first = RecordAggregate.fromRecords({
        events: [createTestEvent('E1'), createTestEvent('E2')],
      });
      const second = RecordAggregate.fromRecords({
        events: [createTestEvent('E2'), createTestEvent('E1')],
      });

      expect(first.equals(second)).toBe(true);
      expect(second.equals(first)).toBe(true);
    });

    it('should compare entries by value, not identity', () => {
      expect(createFullAggregate().equals(createFullAggregate())).toBe(true);
    });

    it('should detect an entry missing from either side', () => {
      const smaller = RecordAggregate.fromRecords({ events: [createTestEvent('E1')] });
      const larger = RecordAggregate.fromRecords({
        events: [createTestEvent('E1'), createTestEvent('E2')],
      });

      expect(smaller.equals(larger)).toBe(false);
      expect(larger.equals(smaller)).toBe(false);
    });

    it('should detect a changed field', () => {
      const first = RecordAggregate.fromRecords({ events: [createTestEvent('E1')] });
      const second = RecordAggregate.fromRecords({ events: [createTestEvent('E1', 'migration')] });

      expect(first.equals(second)).toBe(false);
    });

    it('should compare across kinds', () => {
      const withAgent = RecordAggregate.fromRecords({ agents: [createTestAgent('A1')] });
      const withEvent = RecordAggregate.fromRecords({ events: [createTestEvent('E1')] });

      expect(withAgent.equals(withEvent)).toBe(false);
    });
  });

  describe('validate', () => {
    it('should accept well-formed entries', () => {
      expect(createFullAggregate().validate()).toEqual({ valid: true, errors: [] });
    });

    it('should report each invalid entry by kind and position', () => {
      const aggregate = createFullAggregate();
      aggregate.addEvent({ ...createTestEvent('E3'), eventDateTime: '' });

      const result = aggregate.validate();
      expect(result.valid).toBe(false);
      expect(result.errors.map((error) => error.path)).toEqual(['events[2].eventDateTime']);
    });
  });

  describe('populateFrom', () => {
    it('should request kinds in the order events, agents, rights, objects', () => {
      const aggregate = RecordAggregate.fromRecords({ events: [createTestEvent('E0')] });
      const importer = createRecordingImporter({
        objects: [createTestObject(id('local', 'O1'))],
        events: [createTestEvent('E1')],
      });

      aggregate.populateFrom(importer);

      expect(importer.calls).toEqual(['events', 'agents', 'rights', 'objects']);
      expect(aggregate.counts()).toEqual({ object: 1, event: 2, agent: 0, rights: 0 });
    });

    it('should stop at the first duplicate and keep what was added', () => {
      const logger = createCapturingLogger();
      const aggregate = RecordAggregate.fromRecords(
        { objects: [createTestObject(id('local', 'O0'))] },
        { logger }
      );
      const importer = createRecordingImporter({
        events: [createTestEvent('E1'), createTestEvent('E2')],
        agents: [createTestAgent('A1'), createTestAgent('A1', 'Other')],
        rights: [createTestRights('R1')],
        objects: [createTestObject(id('local', 'O1'))],
      });

      expect(() => aggregate.populateFrom(importer)).toThrow(DuplicateIdentifierError);

      expect(importer.calls).toEqual(['events', 'agents']);
      expect(aggregate.counts()).toEqual({ object: 1, event: 2, agent: 1, rights: 0 });
      expect(logger.entries.some((entry) => entry.message === 'PREMIS entries imported')).toBe(false);
    });

    it('should log what was imported', () => {
      const logger = createCapturingLogger();
      const aggregate = RecordAggregate.fromRecords({ events: [createTestEvent('E0')] }, { logger });

      aggregate.populateFrom(createRecordingImporter({ agents: [createTestAgent('A1')] }));

      const info = logger.entries.filter((entry) => entry.level === 'info');
      expect(info).toHaveLength(1);
      expect(info[0].data).toEqual({ objects: 0, events: 0, agents: 1, rights: 0 });
    });
  });

  describe('populateFromFile', () => {
    it('should require a path when the aggregate has none', async () => {
      const aggregate = createFullAggregate();
      await expect(aggregate.populateFromFile()).rejects.toThrow('No document path supplied');
    });

    it('should read the stored filepath by default', async () => {
      const reader = createInMemoryReader(
        new Map([['extra.xml', '<premis><agent><agentIdentifier><agentIdentifierType>local</agentIdentifierType><agentIdentifierValue>A2</agentIdentifierValue></agentIdentifier></agent></premis>']])
      );
      const aggregate = createFullAggregate();
      aggregate.setFilepath('extra.xml');

      await aggregate.populateFromFile(undefined, reader);

      expect(aggregate.getAgent(id('local', 'A2'))).toEqual({
        kind: 'agent',
        agentIdentifiers: [{ type: 'local', value: 'A2' }],
        names: [],
        notes: [],
        linkingEventIdentifiers: [],
        linkingRightsStatementIdentifiers: [],
      });
    });
  });

  describe('export', () => {
    it('should build a root with namespaces and version', () => {
      const root = createFullAggregate().toTree();

      expect(root.name).toBe('premis:premis');
      expect(root.attributes).toEqual({
        'xmlns:premis': 'http://www.loc.gov/premis/v3',
        'xmlns:xsi': 'http://www.w3.org/2001/XMLSchema-instance',
        version: '3.0',
      });
    });

    it('should append entries in kind order', () => {
      const root = createFullAggregate().toTree();

      expect(root.children.map((child) => ('name' in child ? child.name : ''))).toEqual([
        'premis:object',
        'premis:event',
        'premis:event',
        'premis:rights',
        'premis:agent',
      ]);
    });

    it('should take namespace settings from the call', () => {
      const root = createFullAggregate().toTree({ prefix: '', version: '3.0-test' });

      expect(root.name).toBe('premis');
      expect(root.attributes.xmlns).toBe('http://www.loc.gov/premis/v3');
      expect(root.attributes.version).toBe('3.0-test');

      // The default prefix is untouched for later calls
      expect(createFullAggregate().toTree().name).toBe('premis:premis');
    });

    it('should render text that parses back to the same tree', () => {
      const aggregate = createFullAggregate();
      expect(parseXml(aggregate.toXml())).toEqual(aggregate.toTree());
    });
  });
});
