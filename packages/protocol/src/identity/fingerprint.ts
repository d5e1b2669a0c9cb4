// Canonical value encoding for records

import type { PremisRecord } from '../types/index.js';

/**
 * Encode a value as JSON with object keys sorted and undefined members
 * dropped, so that two structurally equal values encode identically.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => canonicalJson(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`);

  return `{${entries.join(',')}}`;
}

/**
 * Value fingerprint of a record. Two records are equal by value
 * iff their fingerprints are equal.
 */
export function recordFingerprint(record: PremisRecord): string {
  return canonicalJson(record);
}

export function recordsEqual(a: PremisRecord, b: PremisRecord): boolean {
  return recordFingerprint(a) === recordFingerprint(b);
}
