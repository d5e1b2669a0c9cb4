// Identifier-indexed container for the entries of one kind

import type { Identifier, RecordKind, RecordOfKind } from '@premis-kit/protocol';
import {
  DuplicateIdentifierError,
  InvalidRecordError,
  RecordNotFoundError,
  identifierKey,
  identifiersOf,
} from '@premis-kit/protocol';

type IndexEntry = {
  identifier: Identifier;
  position: number;
};

/**
 * Stores the entries of a single kind in insertion order and indexes each
 * one under every identifier it carries.
 *
 * Every registered identifier resolves to exactly one entry, and every
 * identifier of every stored entry is registered. Insertion is all or
 * nothing: a colliding entry leaves the registry as it was.
 *
 * Lookups cost O(1) through a Map keyed by identifierKey().
 *
 * @example
 * ```typescript
 * const events = new NodeRegistry('event');
 * events.insert(ingestEvent);
 * events.get(createIdentifier('local', 'E1')); // ingestEvent
 * events.get(createIdentifier('local', 'E9')); // null
 * ```
 */
export class NodeRegistry<K extends RecordKind> implements Iterable<RecordOfKind<K>> {
  readonly kind: K;
  private readonly records: RecordOfKind<K>[] = [];
  private readonly index = new Map<string, IndexEntry>();

  constructor(kind: K) {
    this.kind = kind;
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Add an entry.
   *
   * @throws InvalidRecordError if the entry is of another kind or has no identifiers
   * @throws DuplicateIdentifierError if any of its identifiers is already registered,
   *   or appears twice in the entry itself
   */
  insert(record: RecordOfKind<K>): void {
    if (record.kind !== this.kind) {
      throw new InvalidRecordError(this.kind, `cannot store a ${record.kind} entry`);
    }

    const identifiers = identifiersOf(record);
    if (identifiers.length === 0) {
      throw new InvalidRecordError(this.kind, 'entry carries no identifiers');
    }

    // Check everything before touching the index
    const keys: string[] = [];
    for (const identifier of identifiers) {
      const key = identifierKey(identifier);
      if (this.index.has(key) || keys.includes(key)) {
        throw new DuplicateIdentifierError(this.kind, identifier);
      }
      keys.push(key);
    }

    const position = this.records.length;
    this.records.push(record);
    identifiers.forEach((identifier, i) => {
      this.index.set(keys[i], { identifier, position });
    });
  }

  has(identifier: Identifier): boolean {
    return this.index.has(identifierKey(identifier));
  }

  /**
   * Look up the entry registered under an identifier.
   *
   * @returns The entry, or null if no entry carries the identifier
   */
  get(identifier: Identifier): RecordOfKind<K> | null {
    const entry = this.index.get(identifierKey(identifier));
    return entry ? this.records[entry.position] : null;
  }

  /**
   * Look up an entry that must exist.
   *
   * @throws RecordNotFoundError if no entry carries the identifier
   */
  require(identifier: Identifier): RecordOfKind<K> {
    const record = this.get(identifier);
    if (record === null) {
      throw new RecordNotFoundError(this.kind, identifier);
    }
    return record;
  }

  /**
   * Look up several entries, returned in query order. An entry carrying
   * more than one of the identifiers appears once per identifier.
   *
   * @throws RecordNotFoundError naming the first identifier with no entry
   */
  getMany(identifiers: readonly Identifier[]): RecordOfKind<K>[] {
    return identifiers.map((identifier) => this.require(identifier));
  }

  /**
   * All entries in insertion order.
   *
   * The array is the registry's own storage, typed readonly; copy it
   * before changing it.
   */
  all(): readonly RecordOfKind<K>[] {
    return this.records;
  }

  /**
   * Registered identifiers, in registration order
   */
  identifiers(): Identifier[] {
    return Array.from(this.index.values(), (entry) => entry.identifier);
  }

  [Symbol.iterator](): Iterator<RecordOfKind<K>> {
    return this.records[Symbol.iterator]();
  }
}
