// Projection of PREMIS entries to and from XML elements
//
// Writing produces elements named with the configured prefix. Reading
// matches elements by local name, collects the fields into a draft and
// parses the draft through the record schemas.

import type { z } from 'zod';
import type {
  Identifier,
  LinkingIdentifier,
  PremisAgent,
  PremisEvent,
  PremisObject,
  PremisRecord,
  PremisRights,
  RecordKind,
} from '../types/index.js';
import { DocumentParseError } from '../errors.js';
import {
  premisAgentSchema,
  premisEventSchema,
  premisObjectSchema,
  premisRightsSchema,
  toValidationErrors,
} from '../validation/records.js';
import type { DocumentOptions } from './options.js';
import type { XmlElement, XmlNode } from './tree.js';
import {
  attributeByLocalName,
  childText,
  childTexts,
  createElement,
  createTextElement,
  findChild,
  findChildren,
  localName,
  qualifiedName,
} from './tree.js';

type ProjectionOptions = Pick<DocumentOptions, 'prefix' | 'xsiPrefix'>;

/**
 * Resolve a top-level element's local name to a record kind
 */
export function recordKindOf(element: XmlElement): RecordKind | undefined {
  switch (localName(element.name)) {
    case 'object':
      return 'object';
    case 'event':
      return 'event';
    case 'agent':
      return 'agent';
    case 'rights':
      return 'rights';
    default:
      return undefined;
  }
}

// --- Writing ---

class ElementWriter {
  constructor(private readonly prefix: string) {}

  name(local: string): string {
    return qualifiedName(this.prefix, local);
  }

  element(local: string, children: XmlNode[], attributes: Record<string, string> = {}): XmlElement {
    return createElement(this.name(local), children, attributes);
  }

  text(local: string, value: string): XmlElement {
    return createTextElement(this.name(local), value);
  }

  optionalText(local: string, value: string | undefined): XmlElement[] {
    return value === undefined ? [] : [this.text(local, value)];
  }

  /**
   * e.g. <objectIdentifier><objectIdentifierType/><objectIdentifierValue/></objectIdentifier>
   */
  identifier(local: string, identifier: Identifier, extra: XmlElement[] = []): XmlElement {
    return this.element(local, [
      this.text(`${local}Type`, identifier.type),
      this.text(`${local}Value`, identifier.value),
      ...extra,
    ]);
  }

  linking(local: string, roleLocal: string, link: LinkingIdentifier): XmlElement {
    return this.identifier(
      local,
      link.identifier,
      link.roles.map((role) => this.text(roleLocal, role))
    );
  }
}

function objectToElement(object: PremisObject, options: ProjectionOptions): XmlElement {
  const w = new ElementWriter(options.prefix);

  return w.element(
    'object',
    [
      ...object.objectIdentifiers.map((id) => w.identifier('objectIdentifier', id)),
      ...(object.preservationLevel === undefined
        ? []
        : [w.element('preservationLevel', [w.text('preservationLevelValue', object.preservationLevel)])]),
      ...object.characteristics.map((characteristics) =>
        w.element('objectCharacteristics', [
          w.text('compositionLevel', String(characteristics.compositionLevel)),
          ...characteristics.fixity.map((fixity) =>
            w.element('fixity', [
              w.text('messageDigestAlgorithm', fixity.messageDigestAlgorithm),
              w.text('messageDigest', fixity.messageDigest),
              ...w.optionalText('messageDigestOriginator', fixity.messageDigestOriginator),
            ])
          ),
          ...w.optionalText(
            'size',
            characteristics.size === undefined ? undefined : String(characteristics.size)
          ),
          ...characteristics.formats.map((format) =>
            w.element('format', [
              w.element('formatDesignation', [
                w.text('formatName', format.formatName),
                ...w.optionalText('formatVersion', format.formatVersion),
              ]),
            ])
          ),
        ])
      ),
      ...w.optionalText('originalName', object.originalName),
      ...object.storage.map((storage) =>
        w.element('storage', [
          w.element('contentLocation', [
            w.text('contentLocationType', storage.contentLocationType),
            w.text('contentLocationValue', storage.contentLocationValue),
          ]),
          ...w.optionalText('storageMedium', storage.storageMedium),
        ])
      ),
      ...object.linkingEventIdentifiers.map((id) => w.identifier('linkingEventIdentifier', id)),
      ...object.linkingRightsStatementIdentifiers.map((id) =>
        w.identifier('linkingRightsStatementIdentifier', id)
      ),
    ],
    { [`${options.xsiPrefix}:type`]: qualifiedName(options.prefix, object.category) }
  );
}

function eventToElement(event: PremisEvent, options: ProjectionOptions): XmlElement {
  const w = new ElementWriter(options.prefix);

  return w.element('event', [
    w.identifier('eventIdentifier', event.eventIdentifier),
    w.text('eventType', event.eventType),
    w.text('eventDateTime', event.eventDateTime),
    ...(event.eventDetail === undefined
      ? []
      : [w.element('eventDetailInformation', [w.text('eventDetail', event.eventDetail)])]),
    ...event.outcomes.map((outcome) =>
      w.element('eventOutcomeInformation', [
        ...w.optionalText('eventOutcome', outcome.outcome),
        ...outcome.detailNotes.map((note) =>
          w.element('eventOutcomeDetail', [w.text('eventOutcomeDetailNote', note)])
        ),
      ])
    ),
    ...event.linkingAgents.map((link) =>
      w.linking('linkingAgentIdentifier', 'linkingAgentRole', link)
    ),
    ...event.linkingObjects.map((link) =>
      w.linking('linkingObjectIdentifier', 'linkingObjectRole', link)
    ),
  ]);
}

function agentToElement(agent: PremisAgent, options: ProjectionOptions): XmlElement {
  const w = new ElementWriter(options.prefix);

  return w.element('agent', [
    ...agent.agentIdentifiers.map((id) => w.identifier('agentIdentifier', id)),
    ...agent.names.map((name) => w.text('agentName', name)),
    ...w.optionalText('agentType', agent.agentType),
    ...w.optionalText('agentVersion', agent.agentVersion),
    ...agent.notes.map((note) => w.text('agentNote', note)),
    ...agent.linkingEventIdentifiers.map((id) => w.identifier('linkingEventIdentifier', id)),
    ...agent.linkingRightsStatementIdentifiers.map((id) =>
      w.identifier('linkingRightsStatementIdentifier', id)
    ),
  ]);
}

function rightsToElement(rights: PremisRights, options: ProjectionOptions): XmlElement {
  const w = new ElementWriter(options.prefix);

  return w.element(
    'rights',
    rights.statements.map((statement) =>
      w.element('rightsStatement', [
        w.identifier('rightsStatementIdentifier', statement.identifier),
        w.text('rightsBasis', statement.basis),
        ...(statement.copyright === undefined
          ? []
          : [
              w.element('copyrightInformation', [
                w.text('copyrightStatus', statement.copyright.copyrightStatus),
                w.text('copyrightJurisdiction', statement.copyright.copyrightJurisdiction),
              ]),
            ]),
        ...statement.granted.map((granted) =>
          w.element('rightsGranted', [
            w.text('act', granted.act),
            ...granted.restrictions.map((restriction) => w.text('restriction', restriction)),
            ...w.optionalText('rightsGrantedNote', granted.note),
          ])
        ),
        ...statement.linkingObjectIdentifiers.map((id) =>
          w.identifier('linkingObjectIdentifier', id)
        ),
        ...statement.linkingAgents.map((link) =>
          w.linking('linkingAgentIdentifier', 'linkingAgentRole', link)
        ),
      ])
    )
  );
}

/**
 * Project a record to its XML element.
 */
export function recordToElement(record: PremisRecord, options: ProjectionOptions): XmlElement {
  switch (record.kind) {
    case 'object':
      return objectToElement(record, options);
    case 'event':
      return eventToElement(record, options);
    case 'agent':
      return agentToElement(record, options);
    case 'rights':
      return rightsToElement(record, options);
    default: {
      const unreachable: never = record;
      throw new Error(`Unknown record kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

// --- Reading ---

type IdentifierDraft = { type: string | undefined; value: string | undefined };

function readIdentifier(element: XmlElement, local: string): IdentifierDraft {
  return {
    type: childText(element, `${local}Type`),
    value: childText(element, `${local}Value`),
  };
}

function readIdentifiers(element: XmlElement, local: string): IdentifierDraft[] {
  return findChildren(element, local).map((child) => readIdentifier(child, local));
}

function readLinking(element: XmlElement, local: string, roleLocal: string) {
  return findChildren(element, local).map((child) => ({
    identifier: readIdentifier(child, local),
    roles: childTexts(child, roleLocal),
  }));
}

function objectDraft(element: XmlElement): Record<string, unknown> {
  const category = attributeByLocalName(element, 'type');
  const level = findChild(element, 'preservationLevel');

  return {
    kind: 'object',
    category: category === undefined ? undefined : localName(category),
    objectIdentifiers: readIdentifiers(element, 'objectIdentifier'),
    preservationLevel: level ? childText(level, 'preservationLevelValue') : undefined,
    characteristics: findChildren(element, 'objectCharacteristics').map((characteristics) => ({
      compositionLevel: childText(characteristics, 'compositionLevel'),
      fixity: findChildren(characteristics, 'fixity').map((fixity) => ({
        messageDigestAlgorithm: childText(fixity, 'messageDigestAlgorithm'),
        messageDigest: childText(fixity, 'messageDigest'),
        messageDigestOriginator: childText(fixity, 'messageDigestOriginator'),
      })),
      size: childText(characteristics, 'size'),
      formats: findChildren(characteristics, 'format').map((format) => {
        const designation = findChild(format, 'formatDesignation');
        return {
          formatName: designation ? childText(designation, 'formatName') : undefined,
          formatVersion: designation ? childText(designation, 'formatVersion') : undefined,
        };
      }),
    })),
    originalName: childText(element, 'originalName'),
    storage: findChildren(element, 'storage').map((storage) => {
      const location = findChild(storage, 'contentLocation');
      return {
        contentLocationType: location ? childText(location, 'contentLocationType') : undefined,
        contentLocationValue: location ? childText(location, 'contentLocationValue') : undefined,
        storageMedium: childText(storage, 'storageMedium'),
      };
    }),
    linkingEventIdentifiers: readIdentifiers(element, 'linkingEventIdentifier'),
    linkingRightsStatementIdentifiers: readIdentifiers(element, 'linkingRightsStatementIdentifier'),
  };
}

function eventDraft(element: XmlElement): Record<string, unknown> {
  const identifier = findChild(element, 'eventIdentifier');
  const detail = findChild(element, 'eventDetailInformation');

  return {
    kind: 'event',
    eventIdentifier: identifier ? readIdentifier(identifier, 'eventIdentifier') : undefined,
    eventType: childText(element, 'eventType'),
    eventDateTime: childText(element, 'eventDateTime'),
    eventDetail: detail ? childText(detail, 'eventDetail') : undefined,
    outcomes: findChildren(element, 'eventOutcomeInformation').map((outcome) => ({
      outcome: childText(outcome, 'eventOutcome'),
      detailNotes: findChildren(outcome, 'eventOutcomeDetail').flatMap((detailElement) =>
        childTexts(detailElement, 'eventOutcomeDetailNote')
      ),
    })),
    linkingAgents: readLinking(element, 'linkingAgentIdentifier', 'linkingAgentRole'),
    linkingObjects: readLinking(element, 'linkingObjectIdentifier', 'linkingObjectRole'),
  };
}

function agentDraft(element: XmlElement): Record<string, unknown> {
  return {
    kind: 'agent',
    agentIdentifiers: readIdentifiers(element, 'agentIdentifier'),
    names: childTexts(element, 'agentName'),
    agentType: childText(element, 'agentType'),
    agentVersion: childText(element, 'agentVersion'),
    notes: childTexts(element, 'agentNote'),
    linkingEventIdentifiers: readIdentifiers(element, 'linkingEventIdentifier'),
    linkingRightsStatementIdentifiers: readIdentifiers(element, 'linkingRightsStatementIdentifier'),
  };
}

function rightsDraft(element: XmlElement): Record<string, unknown> {
  return {
    kind: 'rights',
    statements: findChildren(element, 'rightsStatement').map((statement) => {
      const identifier = findChild(statement, 'rightsStatementIdentifier');
      const copyright = findChild(statement, 'copyrightInformation');
      return {
        identifier: identifier ? readIdentifier(identifier, 'rightsStatementIdentifier') : undefined,
        basis: childText(statement, 'rightsBasis'),
        copyright: copyright
          ? {
              copyrightStatus: childText(copyright, 'copyrightStatus'),
              copyrightJurisdiction: childText(copyright, 'copyrightJurisdiction'),
            }
          : undefined,
        granted: findChildren(statement, 'rightsGranted').map((granted) => ({
          act: childText(granted, 'act'),
          restrictions: childTexts(granted, 'restriction'),
          note: childText(granted, 'rightsGrantedNote'),
        })),
        linkingObjectIdentifiers: readIdentifiers(statement, 'linkingObjectIdentifier'),
        linkingAgents: readLinking(statement, 'linkingAgentIdentifier', 'linkingAgentRole'),
      };
    }),
  };
}

function parseDraft<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  draft: Record<string, unknown>,
  path: string
): T {
  const parsed = schema.safeParse(draft);
  if (!parsed.success) {
    const errors = toValidationErrors(parsed.error.issues);
    const first = errors[0];
    throw new DocumentParseError(`Invalid ${String(draft.kind)} element: ${first.message}`, {
      path: first.path ? `${path}.${first.path}` : path,
      details: { errors },
    });
  }
  return parsed.data;
}

/**
 * Read an <object> element.
 *
 * @param path - Location of the element, used in error messages
 * @throws DocumentParseError if the element does not describe a valid object
 */
export function elementToObject(element: XmlElement, path = 'object'): PremisObject {
  return parseDraft(premisObjectSchema, objectDraft(element), path);
}

export function elementToEvent(element: XmlElement, path = 'event'): PremisEvent {
  return parseDraft(premisEventSchema, eventDraft(element), path);
}

export function elementToAgent(element: XmlElement, path = 'agent'): PremisAgent {
  return parseDraft(premisAgentSchema, agentDraft(element), path);
}

export function elementToRights(element: XmlElement, path = 'rights'): PremisRights {
  return parseDraft(premisRightsSchema, rightsDraft(element), path);
}

/**
 * Read any top-level entry element, dispatching on its local name.
 *
 * @throws DocumentParseError for an element that is not a PREMIS entry
 */
export function elementToRecord(element: XmlElement, path = localName(element.name)): PremisRecord {
  const kind = recordKindOf(element);
  switch (kind) {
    case 'object':
      return elementToObject(element, path);
    case 'event':
      return elementToEvent(element, path);
    case 'agent':
      return elementToAgent(element, path);
    case 'rights':
      return elementToRights(element, path);
    case undefined:
      throw new DocumentParseError(`Not a PREMIS entry element: ${element.name}`, { path });
  }
}
