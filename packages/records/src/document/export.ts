// Document export: entries -> PREMIS XML tree and text

import type { DocumentOptions, PremisRecord, XmlElement } from '@premis-kit/protocol';
import {
  ROOT_ELEMENT,
  createElement,
  qualifiedName,
  recordToElement,
  resolveDocumentOptions,
  serializeXml,
  silentLogger,
} from '@premis-kit/protocol';
import { createFilesystemWriter, encodeDocument } from './fs.js';
import type { ExportOptions, ExportSummary } from './types.js';

/**
 * Build the <premis> root for a set of entries.
 *
 * The root declares the PREMIS and XSI namespaces and carries the
 * version attribute; entries follow in the order given.
 */
export function buildDocumentTree(
  records: Iterable<PremisRecord>,
  options: DocumentOptions
): XmlElement {
  const root = createElement(qualifiedName(options.prefix, ROOT_ELEMENT), [], {
    [options.prefix ? `xmlns:${options.prefix}` : 'xmlns']: options.namespace,
    [`xmlns:${options.xsiPrefix}`]: options.xsiNamespace,
    version: options.version,
  });

  for (const record of records) {
    root.children.push(recordToElement(record, options));
  }

  return root;
}

/**
 * Render a set of entries as a PREMIS document.
 *
 * @throws ConfigurationError if an option override is invalid
 */
export function renderDocument(
  records: Iterable<PremisRecord>,
  overrides: Partial<DocumentOptions> = {}
): string {
  const options = resolveDocumentOptions(overrides);
  return serializeXml(buildDocumentTree(records, options), options);
}

/**
 * Write a set of entries to a document in one pass.
 *
 * @param records - Entries in document order
 * @param path - Target location
 * @param options - Document options plus writer and logger
 * @returns Summary of the export operation
 */
export async function writeDocument(
  records: Iterable<PremisRecord>,
  path: string,
  options: ExportOptions = {}
): Promise<ExportSummary> {
  const { writer = createFilesystemWriter(), logger = silentLogger, ...overrides } = options;
  const resolved = resolveDocumentOptions(overrides);

  const summary: ExportSummary = {
    path,
    objectCount: 0,
    eventCount: 0,
    agentCount: 0,
    rightsCount: 0,
    bytesWritten: 0,
    exportedAt: new Date().toISOString(),
  };

  const entries = Array.from(records);
  for (const record of entries) {
    switch (record.kind) {
      case 'object':
        summary.objectCount++;
        break;
      case 'event':
        summary.eventCount++;
        break;
      case 'agent':
        summary.agentCount++;
        break;
      case 'rights':
        summary.rightsCount++;
        break;
    }
  }

  const content = serializeXml(buildDocumentTree(entries, resolved), resolved);
  await writer.writeFile(path, content, resolved.encoding);
  summary.bytesWritten = encodeDocument(content, resolved.encoding).byteLength;

  logger.info('PREMIS document written', {
    path,
    entries: entries.length,
    bytes: summary.bytesWritten,
  });

  return summary;
}
