// Document import/export abstractions.
// Allows testing and different storage backends (filesystem, in-memory, etc.)

import type {
  DocumentOptions,
  PremisAgent,
  PremisEvent,
  PremisObject,
  PremisRights,
  RecordLogger,
} from '@premis-kit/protocol';

/**
 * Text encodings a document can be stored in
 */
export type DocumentEncoding = DocumentOptions['encoding'];

/**
 * Abstraction for reading documents.
 */
export interface DocumentReader {
  /**
   * Check if a path exists.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Read a document as text, decoding it by its byte order mark
   * (UTF-8 when there is none).
   */
  readFile(path: string): Promise<string>;
}

/**
 * Abstraction for writing documents.
 */
export interface DocumentWriter {
  /**
   * Write a whole document in one pass.
   * Creates parent directories as needed.
   */
  writeFile(path: string, content: string, encoding: DocumentEncoding): Promise<void>;
}

/**
 * Source of parsed entries, one sequence per kind.
 *
 * RecordAggregate.populateFrom() calls these in the order
 * events, agents, rights, objects.
 */
export interface DocumentImporter {
  findEvents(): PremisEvent[];
  findAgents(): PremisAgent[];
  findRights(): PremisRights[];
  findObjects(): PremisObject[];
}

/**
 * Options for reading a document.
 */
export type ImportOptions = {
  /**
   * Reader for file access (defaults to the local filesystem)
   */
  reader?: DocumentReader;

  /**
   * Logger for warnings about unexpected content
   */
  logger?: RecordLogger;
};

/**
 * Options for writing a document.
 */
export type ExportOptions = Partial<DocumentOptions> & {
  /**
   * Writer for file access (defaults to the local filesystem)
   */
  writer?: DocumentWriter;

  logger?: RecordLogger;
};

/**
 * Summary of an export operation.
 */
export type ExportSummary = {
  path: string;
  objectCount: number;
  eventCount: number;
  agentCount: number;
  rightsCount: number;
  bytesWritten: number;
  exportedAt: string;
};
