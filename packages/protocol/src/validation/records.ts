// Record Validation
//
// zod schemas for the four PREMIS entry kinds. The importer parses projected
// element data through these schemas; callers can also check records they
// built by hand. This is a structural check, not validation against the XSD.

import { z } from 'zod';
import type {
  PremisAgent,
  PremisEvent,
  PremisObject,
  PremisRecord,
  PremisRights,
} from '../types/index.js';
import { OBJECT_CATEGORIES } from '../types/index.js';
import { identifierKey, identifiersOf, formatIdentifier } from '../identity/index.js';

export const identifierSchema = z.object({
  type: z.string().min(1),
  value: z.string().min(1),
});

/**
 * Non-negative integer given as a number, or as a string of digits when
 * read from a document. Empty strings and unsafe integers are rejected.
 */
const countSchema = z.preprocess(
  (value) => (typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value),
  z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)
);

const linkingIdentifierSchema = z.object({
  identifier: identifierSchema,
  roles: z.array(z.string()).default([]),
});

const objectShape = z.object({
  kind: z.literal('object'),
  category: z.enum(OBJECT_CATEGORIES),
  objectIdentifiers: z.array(identifierSchema).min(1),
  preservationLevel: z.string().optional(),
  characteristics: z
    .array(
      z.object({
        compositionLevel: countSchema,
        fixity: z
          .array(
            z.object({
              messageDigestAlgorithm: z.string().min(1),
              messageDigest: z.string().min(1),
              messageDigestOriginator: z.string().optional(),
            })
          )
          .default([]),
        size: countSchema.optional(),
        formats: z
          .array(
            z.object({
              formatName: z.string().min(1),
              formatVersion: z.string().optional(),
            })
          )
          .default([]),
      })
    )
    .default([]),
  originalName: z.string().optional(),
  storage: z
    .array(
      z.object({
        contentLocationType: z.string().min(1),
        contentLocationValue: z.string().min(1),
        storageMedium: z.string().optional(),
      })
    )
    .default([]),
  linkingEventIdentifiers: z.array(identifierSchema).default([]),
  linkingRightsStatementIdentifiers: z.array(identifierSchema).default([]),
});

const eventShape = z.object({
  kind: z.literal('event'),
  eventIdentifier: identifierSchema,
  eventType: z.string().min(1),
  eventDateTime: z.string().min(1),
  eventDetail: z.string().optional(),
  outcomes: z
    .array(
      z.object({
        outcome: z.string().optional(),
        detailNotes: z.array(z.string()).default([]),
      })
    )
    .default([]),
  linkingAgents: z.array(linkingIdentifierSchema).default([]),
  linkingObjects: z.array(linkingIdentifierSchema).default([]),
});

const agentShape = z.object({
  kind: z.literal('agent'),
  agentIdentifiers: z.array(identifierSchema).min(1),
  names: z.array(z.string()).default([]),
  agentType: z.string().optional(),
  agentVersion: z.string().optional(),
  notes: z.array(z.string()).default([]),
  linkingEventIdentifiers: z.array(identifierSchema).default([]),
  linkingRightsStatementIdentifiers: z.array(identifierSchema).default([]),
});

const rightsShape = z.object({
  kind: z.literal('rights'),
  statements: z
    .array(
      z.object({
        identifier: identifierSchema,
        basis: z.string().min(1),
        copyright: z
          .object({
            copyrightStatus: z.string().min(1),
            copyrightJurisdiction: z.string().min(1),
          })
          .optional(),
        granted: z
          .array(
            z.object({
              act: z.string().min(1),
              restrictions: z.array(z.string()).default([]),
              note: z.string().optional(),
            })
          )
          .default([]),
        linkingObjectIdentifiers: z.array(identifierSchema).default([]),
        linkingAgents: z.array(linkingIdentifierSchema).default([]),
      })
    )
    .min(1),
});

export const premisObjectSchema: z.ZodType<PremisObject, z.ZodTypeDef, unknown> = objectShape;
export const premisEventSchema: z.ZodType<PremisEvent, z.ZodTypeDef, unknown> = eventShape;
export const premisAgentSchema: z.ZodType<PremisAgent, z.ZodTypeDef, unknown> = agentShape;
export const premisRightsSchema: z.ZodType<PremisRights, z.ZodTypeDef, unknown> = rightsShape;

export const premisRecordSchema: z.ZodType<PremisRecord, z.ZodTypeDef, unknown> =
  z.discriminatedUnion('kind', [objectShape, eventShape, agentShape, rightsShape]);

/**
 * Result of validating a record
 */
export type RecordValidationResult = {
  valid: boolean;
  errors: RecordValidationError[];
};

/**
 * A validation error with context
 */
export type RecordValidationError = {
  path: string;
  message: string;
  code: RecordValidationErrorCode;
};

export type RecordValidationErrorCode =
  | 'MISSING_FIELD'
  | 'INVALID_TYPE'
  | 'INVALID_VALUE'
  | 'DUPLICATE_ID';

/**
 * Render a zod issue path the way error messages show it, e.g. "statements[0].basis"
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path
    .map((segment, index) =>
      typeof segment === 'number' ? `[${segment}]` : index === 0 ? segment : `.${segment}`
    )
    .join('');
}

/**
 * Convert zod issues to validation errors.
 */
export function toValidationErrors(
  issues: readonly z.ZodIssue[],
  pathPrefix = ''
): RecordValidationError[] {
  return issues.map((issue) => {
    const issuePath = formatIssuePath(issue.path);
    const path = pathPrefix && issuePath ? `${pathPrefix}.${issuePath}` : pathPrefix || issuePath;

    let code: RecordValidationErrorCode = 'INVALID_VALUE';
    if (issue.code === z.ZodIssueCode.invalid_type) {
      code = issue.received === 'undefined' ? 'MISSING_FIELD' : 'INVALID_TYPE';
    }

    return { path, message: issue.message, code };
  });
}

/**
 * Validate a single record.
 *
 * Checks the shape of the record and that it does not carry the same
 * identifier twice (a registry would reject such a record).
 *
 * @param record - Record to check
 * @param pathPrefix - Prefix for error paths, e.g. "events[3]"
 */
export function validateRecord(record: PremisRecord, pathPrefix = ''): RecordValidationResult {
  const parsed = premisRecordSchema.safeParse(record);
  if (!parsed.success) {
    return { valid: false, errors: toValidationErrors(parsed.error.issues, pathPrefix) };
  }

  const errors: RecordValidationError[] = [];
  const seen = new Set<string>();
  for (const identifier of identifiersOf(parsed.data)) {
    const key = identifierKey(identifier);
    if (seen.has(key)) {
      errors.push({
        path: pathPrefix,
        message: `Identifier ${formatIdentifier(identifier)} appears more than once`,
        code: 'DUPLICATE_ID',
      });
    }
    seen.add(key);
  }

  return { valid: errors.length === 0, errors };
}
