// RecordAggregate - the top-level container for one PREMIS record set

import type {
  DocumentOptions,
  Identifier,
  PremisAgent,
  PremisEvent,
  PremisObject,
  PremisRecord,
  PremisRights,
  RecordKind,
  RecordLogger,
  RecordOfKind,
  RecordValidationError,
  RecordValidationResult,
  XmlElement,
} from '@premis-kit/protocol';
import {
  ConfigurationError,
  IMPORT_KIND_ORDER,
  RECORD_KIND_ORDER,
  formatIdentifier,
  identifiersOf,
  recordFingerprint,
  resolveDocumentOptions,
  silentLogger,
  validateRecord,
} from '@premis-kit/protocol';
import { NodeRegistry } from '../registry/node-registry.js';
import { buildDocumentTree, renderDocument, writeDocument } from '../document/export.js';
import { XmlDocumentImporter } from '../document/import.js';
import type {
  DocumentImporter,
  DocumentReader,
  ExportOptions,
  ExportSummary,
} from '../document/types.js';

/**
 * Entries to seed an aggregate with, per kind
 */
export type RecordSequences = {
  objects?: readonly PremisObject[];
  events?: readonly PremisEvent[];
  agents?: readonly PremisAgent[];
  rights?: readonly PremisRights[];
};

/**
 * Construction input: entry sequences or a document path, never both
 */
export type RecordAggregateInit = RecordSequences & {
  fromPath?: string;
};

export type RecordAggregateOptions = {
  /**
   * Logger for insertions and imports (defaults to silent)
   */
  logger?: RecordLogger;

  /**
   * Reader used when loading from a path (defaults to the local filesystem)
   */
  reader?: DocumentReader;
};

function hasSequences(init: RecordSequences): boolean {
  return [init.objects, init.events, init.agents, init.rights].some(
    (sequence) => sequence !== undefined && sequence.length > 0
  );
}

/**
 * Holds the objects, events, agents and rights of one PREMIS record set,
 * each kind in its own identifier-indexed registry.
 *
 * Entries can only be added, one at a time; nothing is removed, replaced
 * or merged. Identifiers must be unique within a kind.
 *
 * Not safe for concurrent writers. Finish populating an aggregate before
 * handing it to readers.
 *
 * @example
 * ```typescript
 * const record = RecordAggregate.fromRecords({ events: [ingest] });
 * record.addEvent(fixityCheck);
 * record.getEvent(createIdentifier('local', 'E1'));
 * await record.writeToFile('premis.xml');
 * ```
 */
export class RecordAggregate implements Iterable<PremisRecord> {
  private readonly objects = new NodeRegistry('object');
  private readonly events = new NodeRegistry('event');
  private readonly agents = new NodeRegistry('agent');
  private readonly rights = new NodeRegistry('rights');
  private path: string | null;
  private readonly logger: RecordLogger;

  private constructor(path: string | null, logger: RecordLogger) {
    this.path = path;
    this.logger = logger;
  }

  /**
   * Create an aggregate from entry sequences, added in the order
   * objects, events, agents, rights.
   *
   * @throws ConfigurationError if every sequence is missing or empty
   * @throws DuplicateIdentifierError if two entries of a kind share an identifier
   */
  static fromRecords(sequences: RecordSequences, options: RecordAggregateOptions = {}): RecordAggregate {
    if (!hasSequences(sequences)) {
      throw new ConfigurationError('Supply at least one non-empty sequence of PREMIS entries');
    }

    const aggregate = new RecordAggregate(null, options.logger ?? silentLogger);
    sequences.objects?.forEach((object) => aggregate.addObject(object));
    sequences.events?.forEach((event) => aggregate.addEvent(event));
    sequences.agents?.forEach((agent) => aggregate.addAgent(agent));
    sequences.rights?.forEach((rights) => aggregate.addRights(rights));
    return aggregate;
  }

  /**
   * Create an aggregate from a PREMIS document. The path is kept as the
   * aggregate's provenance.
   *
   * @throws ConfigurationError if the path is empty or the document is missing
   * @throws DocumentParseError if the document cannot be read
   * @throws DuplicateIdentifierError if the document repeats an identifier within a kind
   */
  static async fromFile(path: string, options: RecordAggregateOptions = {}): Promise<RecordAggregate> {
    if (!path) {
      throw new ConfigurationError('Supply a document path');
    }

    const aggregate = new RecordAggregate(path, options.logger ?? silentLogger);
    await aggregate.populateFromFile(path, options.reader);
    return aggregate;
  }

  get filepath(): string | null {
    return this.path;
  }

  setFilepath(path: string): void {
    this.path = path;
  }

  // --- Adding ---

  /**
   * @throws DuplicateIdentifierError if any of the object's identifiers is taken
   */
  addObject(object: PremisObject): void {
    this.insert(this.objects, object);
  }

  /**
   * @throws DuplicateIdentifierError if the event's identifier is taken
   */
  addEvent(event: PremisEvent): void {
    this.insert(this.events, event);
  }

  /**
   * @throws DuplicateIdentifierError if any of the agent's identifiers is taken
   */
  addAgent(agent: PremisAgent): void {
    this.insert(this.agents, agent);
  }

  /**
   * @throws DuplicateIdentifierError if any rights statement identifier is taken
   */
  addRights(rights: PremisRights): void {
    this.insert(this.rights, rights);
  }

  private insert<K extends RecordKind>(registry: NodeRegistry<K>, record: RecordOfKind<K>): void {
    registry.insert(record);
    this.logger.debug(`Added ${record.kind}`, {
      identifiers: identifiersOf(record).map(formatIdentifier),
    });
  }

  // --- Lookup ---

  getObject(identifier: Identifier): PremisObject | null {
    return this.objects.get(identifier);
  }

  getEvent(identifier: Identifier): PremisEvent | null {
    return this.events.get(identifier);
  }

  getAgent(identifier: Identifier): PremisAgent | null {
    return this.agents.get(identifier);
  }

  getRights(identifier: Identifier): PremisRights | null {
    return this.rights.get(identifier);
  }

  /**
   * @throws RecordNotFoundError if no object carries the identifier
   */
  requireObject(identifier: Identifier): PremisObject {
    return this.objects.require(identifier);
  }

  /**
   * @throws RecordNotFoundError if no event carries the identifier
   */
  requireEvent(identifier: Identifier): PremisEvent {
    return this.events.require(identifier);
  }

  /**
   * @throws RecordNotFoundError if no agent carries the identifier
   */
  requireAgent(identifier: Identifier): PremisAgent {
    return this.agents.require(identifier);
  }

  /**
   * @throws RecordNotFoundError if no rights statement carries the identifier
   */
  requireRights(identifier: Identifier): PremisRights {
    return this.rights.require(identifier);
  }

  listObjects(): readonly PremisObject[] {
    return this.objects.all();
  }

  listEvents(): readonly PremisEvent[] {
    return this.events.all();
  }

  listAgents(): readonly PremisAgent[] {
    return this.agents.all();
  }

  listRights(): readonly PremisRights[] {
    return this.rights.all();
  }

  // --- Enumeration ---

  get size(): number {
    return this.objects.size + this.events.size + this.agents.size + this.rights.size;
  }

  counts(): Record<RecordKind, number> {
    return {
      object: this.objects.size,
      event: this.events.size,
      agent: this.agents.size,
      rights: this.rights.size,
    };
  }

  /**
   * All entries: objects, events, rights, then agents, each kind in
   * insertion order. Only the order within a kind is guaranteed.
   */
  records(): PremisRecord[] {
    const byKind: Record<RecordKind, readonly PremisRecord[]> = {
      object: this.objects.all(),
      event: this.events.all(),
      agent: this.agents.all(),
      rights: this.rights.all(),
    };
    return RECORD_KIND_ORDER.flatMap((kind) => byKind[kind]);
  }

  [Symbol.iterator](): Iterator<PremisRecord> {
    return this.records()[Symbol.iterator]();
  }

  /**
   * Set equivalence by value: every entry of one aggregate equals some
   * entry of the other, and the reverse. Order and repetition are ignored.
   *
   * O(n) over record fingerprints.
   */
  equals(other: RecordAggregate): boolean {
    const mine = new Set(this.records().map(recordFingerprint));
    const theirs = new Set(other.records().map(recordFingerprint));

    for (const fingerprint of mine) {
      if (!theirs.has(fingerprint)) return false;
    }
    for (const fingerprint of theirs) {
      if (!mine.has(fingerprint)) return false;
    }
    return true;
  }

  /**
   * Check the structure of every entry. Paths in the result name the
   * entry by kind and position, e.g. "events[2].eventType".
   */
  validate(): RecordValidationResult {
    const errors: RecordValidationError[] = [];
    const lists: Array<[string, readonly PremisRecord[]]> = [
      ['objects', this.objects.all()],
      ['events', this.events.all()],
      ['agents', this.agents.all()],
      ['rights', this.rights.all()],
    ];

    for (const [label, records] of lists) {
      records.forEach((record, i) => {
        errors.push(...validateRecord(record, `${label}[${i}]`).errors);
      });
    }

    return { valid: errors.length === 0, errors };
  }

  // --- Import ---

  /**
   * Add every entry an importer yields, in the order events, agents,
   * rights, objects.
   *
   * Stops at the first duplicate identifier. Entries added before it stay
   * in the aggregate.
   *
   * @throws DuplicateIdentifierError on the first collision
   */
  populateFrom(importer: DocumentImporter): void {
    const before = this.counts();

    for (const kind of IMPORT_KIND_ORDER) {
      switch (kind) {
        case 'event':
          importer.findEvents().forEach((event) => this.addEvent(event));
          break;
        case 'agent':
          importer.findAgents().forEach((agent) => this.addAgent(agent));
          break;
        case 'rights':
          importer.findRights().forEach((rights) => this.addRights(rights));
          break;
        case 'object':
          importer.findObjects().forEach((object) => this.addObject(object));
          break;
      }
    }

    const after = this.counts();
    this.logger.info('PREMIS entries imported', {
      objects: after.object - before.object,
      events: after.event - before.event,
      agents: after.agent - before.agent,
      rights: after.rights - before.rights,
    });
  }

  /**
   * Read a document and add its entries.
   *
   * @param path - Document location; defaults to the aggregate's filepath
   * @param reader - Reader for file access (defaults to the local filesystem)
   * @throws ConfigurationError if no path is given and the aggregate has none
   */
  async populateFromFile(path?: string, reader?: DocumentReader): Promise<void> {
    const source = path ?? this.path;
    if (!source) {
      throw new ConfigurationError('No document path supplied');
    }

    const importer = await XmlDocumentImporter.fromFile(source, { reader, logger: this.logger });
    this.populateFrom(importer);
  }

  // --- Export ---

  /**
   * Build the document tree for this aggregate.
   *
   * @throws ConfigurationError if an option override is invalid
   */
  toTree(options: Partial<DocumentOptions> = {}): XmlElement {
    return buildDocumentTree(this, resolveDocumentOptions(options));
  }

  /**
   * Render this aggregate as PREMIS XML text.
   */
  toXml(options: Partial<DocumentOptions> = {}): string {
    return renderDocument(this, options);
  }

  /**
   * Write this aggregate to a document in one pass.
   */
  async writeToFile(path: string, options: ExportOptions = {}): Promise<ExportSummary> {
    return writeDocument(this, path, { logger: this.logger, ...options });
  }
}

/**
 * Create an aggregate from either entry sequences or a document path.
 *
 * @throws ConfigurationError if both or neither are supplied
 */
export async function createRecordAggregate(
  init: RecordAggregateInit,
  options: RecordAggregateOptions = {}
): Promise<RecordAggregate> {
  const { fromPath, ...sequences } = init;
  const withPath = fromPath !== undefined && fromPath !== '';
  const withRecords = hasSequences(sequences);

  if (withPath === withRecords) {
    throw new ConfigurationError(
      'Supply either a document path or at least one non-empty sequence of PREMIS entries, not both',
      { fromPath: fromPath ?? null, withRecords }
    );
  }

  return withPath ? RecordAggregate.fromFile(fromPath, options) : RecordAggregate.fromRecords(sequences, options);
}
