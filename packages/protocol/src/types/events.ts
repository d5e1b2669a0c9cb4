// Event types - actions performed on objects

import type { Identifier, LinkingIdentifier, Timestamp } from './common.js';

export type EventOutcome = {
  /**
   * e.g. "success", "failure"
   */
  outcome?: string;

  detailNotes: string[];
};

/**
 * A PREMIS Event entry. Events carry exactly one identifier.
 */
export type PremisEvent = {
  kind: 'event';
  eventIdentifier: Identifier;

  /**
   * e.g. "ingestion", "fixity check", "migration"
   */
  eventType: string;

  eventDateTime: Timestamp;
  eventDetail?: string;
  outcomes: EventOutcome[];
  linkingAgents: LinkingIdentifier[];
  linkingObjects: LinkingIdentifier[];
};
