// Identifier helpers and the per-kind identifier-extraction rule

import type { Identifier, PremisRecord } from '../types/index.js';

/**
 * Create an immutable identifier.
 */
export function createIdentifier(type: string, value: string): Identifier {
  return Object.freeze({ type, value });
}

/**
 * Build the lookup key for an identifier.
 *
 * The key is the JSON encoding of the pair, so no choice of separator
 * can make two different pairs collide.
 */
export function identifierKey(identifier: Identifier): string {
  return JSON.stringify([identifier.type, identifier.value]);
}

export function identifiersEqual(a: Identifier, b: Identifier): boolean {
  return a.type === b.type && a.value === b.value;
}

/**
 * Human-readable form used in error messages and logs.
 */
export function formatIdentifier(identifier: Identifier): string {
  return `${identifier.type}:${identifier.value}`;
}

/**
 * Extract the identifiers a record is addressable by, in document order.
 *
 * - Object, Agent: every object/agent identifier
 * - Event: its single event identifier
 * - Rights: the identifier of each contained rights statement
 */
export function identifiersOf(record: PremisRecord): Identifier[] {
  switch (record.kind) {
    case 'object':
      return [...record.objectIdentifiers];
    case 'event':
      return [record.eventIdentifier];
    case 'agent':
      return [...record.agentIdentifiers];
    case 'rights':
      return record.statements.map((statement) => statement.identifier);
    default: {
      const unreachable: never = record;
      throw new Error(`Unknown record kind: ${JSON.stringify(unreachable)}`);
    }
  }
}
