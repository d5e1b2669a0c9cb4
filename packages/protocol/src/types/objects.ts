// Object types - the digital assets being preserved

import type { Identifier } from './common.js';

/**
 * PREMIS object categories, serialized as the xsi:type of the object element
 */
export const OBJECT_CATEGORIES = ['file', 'representation', 'bitstream', 'intellectualEntity'] as const;

export type ObjectCategory = (typeof OBJECT_CATEGORIES)[number];

/**
 * A message digest recorded for an object
 */
export type Fixity = {
  messageDigestAlgorithm: string;
  messageDigest: string;

  /**
   * Agent that originally produced the digest
   */
  messageDigestOriginator?: string;
};

export type ObjectFormat = {
  formatName: string;
  formatVersion?: string;
};

/**
 * Technical properties of a file or bitstream
 */
export type ObjectCharacteristics = {
  compositionLevel: number;
  fixity: Fixity[];

  /**
   * Size in bytes
   */
  size?: number;

  formats: ObjectFormat[];
};

/**
 * Where and on what an object is stored
 */
export type ObjectStorage = {
  contentLocationType: string;
  contentLocationValue: string;
  storageMedium?: string;
};

/**
 * A PREMIS Object entry.
 *
 * An object may be addressable under more than one identifier, so
 * objectIdentifiers always holds at least one entry.
 */
export type PremisObject = {
  kind: 'object';
  category: ObjectCategory;
  objectIdentifiers: Identifier[];

  /**
   * e.g. "full", "bit-level"
   */
  preservationLevel?: string;

  characteristics: ObjectCharacteristics[];
  originalName?: string;
  storage: ObjectStorage[];
  linkingEventIdentifiers: Identifier[];
  linkingRightsStatementIdentifiers: Identifier[];
};
