// The closed union of top-level PREMIS entries

import type { RecordKind } from './common.js';
import type { PremisObject } from './objects.js';
import type { PremisEvent } from './events.js';
import type { PremisAgent } from './agents.js';
import type { PremisRights } from './rights.js';

export type PremisRecord = PremisObject | PremisEvent | PremisAgent | PremisRights;

/**
 * Map a record kind to its record type
 */
export type RecordOfKind<K extends RecordKind> = Extract<PremisRecord, { kind: K }>;
