// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * The four kinds of top-level PREMIS entries.
 */
export type RecordKind = 'object' | 'event' | 'agent' | 'rights';

/**
 * Kind order used when enumerating or exporting a record set.
 */
export const RECORD_KIND_ORDER: readonly RecordKind[] = ['object', 'event', 'rights', 'agent'];

/**
 * Kind order used when importing a document.
 */
export const IMPORT_KIND_ORDER: readonly RecordKind[] = ['event', 'agent', 'rights', 'object'];

/**
 * A (type, value) pair naming a record within its kind.
 *
 * Equality is exact on both parts: no case folding, no trimming.
 */
export type Identifier = {
  readonly type: string;
  readonly value: string;
};

/**
 * An identifier that links to another entry, qualified by zero or more roles
 * (e.g. the agent that "executed" an event).
 */
export type LinkingIdentifier = {
  identifier: Identifier;
  roles: string[];
};
