// Error types shared by the protocol and records packages

import type { Identifier, RecordKind } from './types/index.js';
import { formatIdentifier } from './identity/index.js';

/**
 * Base class for all PREMIS record errors.
 * Provides structured error information for debugging and logging.
 */
export class PremisError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'PremisError';
    this.code = code;
  }
}

/**
 * Error for contradictory or missing construction and export options.
 */
export class ConfigurationError extends PremisError {
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

/**
 * Error when a record is inserted under an identifier already registered
 * for its kind.
 */
export class DuplicateIdentifierError extends PremisError {
  readonly kind: RecordKind;
  readonly identifier: Identifier;

  constructor(kind: RecordKind, identifier: Identifier) {
    super('DUPLICATE_IDENTIFIER', `Duplicate ${kind} identifier: ${formatIdentifier(identifier)}`);
    this.name = 'DuplicateIdentifierError';
    this.kind = kind;
    this.identifier = identifier;
  }
}

/**
 * Error when a lookup that requires a result finds no record.
 */
export class RecordNotFoundError extends PremisError {
  readonly kind: RecordKind;
  readonly identifier: Identifier;

  constructor(kind: RecordKind, identifier: Identifier) {
    super('RECORD_NOT_FOUND', `No ${kind} found for identifier ${formatIdentifier(identifier)}`);
    this.name = 'RecordNotFoundError';
    this.kind = kind;
    this.identifier = identifier;
  }
}

/**
 * Error for a record that breaks a structural rule, e.g. one carrying
 * no identifiers or handed to the registry of another kind.
 */
export class InvalidRecordError extends PremisError {
  readonly kind: RecordKind;

  constructor(kind: RecordKind, reason: string) {
    super('INVALID_RECORD', `Invalid ${kind} record: ${reason}`);
    this.name = 'InvalidRecordError';
    this.kind = kind;
  }
}

/**
 * Error for a document that cannot be read as PREMIS XML.
 */
export class DocumentParseError extends PremisError {
  /**
   * Location of the problem, as an element path such as "premis/event[2].eventType"
   */
  readonly path?: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, options?: { path?: string; details?: Record<string, unknown> }) {
    super('DOCUMENT_PARSE_ERROR', options?.path ? `${message} (at ${options.path})` : message);
    this.name = 'DocumentParseError';
    this.path = options?.path;
    this.details = options?.details;
  }
}
