// Rights types - permissions asserted over objects

import type { Identifier, LinkingIdentifier } from './common.js';

/**
 * e.g. "copyright", "license", "statute", "other"
 */
export type RightsBasis = string;

export type CopyrightInformation = {
  copyrightStatus: string;
  copyrightJurisdiction: string;
};

/**
 * An action the rights holder permits, e.g. "replicate" or "disseminate"
 */
export type RightsGranted = {
  act: string;
  restrictions: string[];
  note?: string;
};

/**
 * A single independently identified rights statement
 */
export type RightsStatement = {
  identifier: Identifier;
  basis: RightsBasis;
  copyright?: CopyrightInformation;
  granted: RightsGranted[];
  linkingObjectIdentifiers: Identifier[];
  linkingAgents: LinkingIdentifier[];
};

/**
 * A PREMIS Rights entry. A rights entry aggregates one or more statements
 * and is addressable by the identifier of any of them.
 */
export type PremisRights = {
  kind: 'rights';
  statements: RightsStatement[];
};
