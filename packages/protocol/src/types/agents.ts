// Agent types - people, organizations and software that act on objects

import type { Identifier } from './common.js';

/**
 * A PREMIS Agent entry.
 */
export type PremisAgent = {
  kind: 'agent';
  agentIdentifiers: Identifier[];
  names: string[];

  /**
   * e.g. "person", "organization", "software"
   */
  agentType?: string;

  agentVersion?: string;
  notes: string[];
  linkingEventIdentifiers: Identifier[];
  linkingRightsStatementIdentifiers: Identifier[];
};
