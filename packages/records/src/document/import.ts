// Document import: PREMIS XML text -> typed entries per kind

import type {
  PremisAgent,
  PremisEvent,
  PremisObject,
  PremisRecord,
  PremisRights,
  RecordKind,
  RecordLogger,
  XmlElement,
} from '@premis-kit/protocol';
import {
  ConfigurationError,
  DocumentParseError,
  PREMIS_NAMESPACE,
  ROOT_ELEMENT,
  childElements,
  elementToAgent,
  elementToEvent,
  elementToObject,
  elementToRights,
  localName,
  namePrefix,
  parseXml,
  recordKindOf,
  silentLogger,
} from '@premis-kit/protocol';
import { createFilesystemReader } from './fs.js';
import type { DocumentImporter, ImportOptions } from './types.js';

type ElementReader<T extends PremisRecord> = (element: XmlElement, path: string) => T;

/**
 * Reads the entries of a PREMIS document.
 *
 * Entries are the direct children of the <premis> root; each find*()
 * call returns the entries of one kind in document order, whatever
 * order the kinds are interleaved in.
 *
 * @example
 * ```typescript
 * const importer = await XmlDocumentImporter.fromFile('premis.xml');
 * const events = importer.findEvents();
 * ```
 */
export class XmlDocumentImporter implements DocumentImporter {
  private readonly root: XmlElement;

  /**
   * Path or label of the document, for logs
   */
  readonly source: string;

  private constructor(root: XmlElement, source: string, logger: RecordLogger) {
    this.root = root;
    this.source = source;

    if (localName(root.name) !== ROOT_ELEMENT) {
      throw new DocumentParseError(`Expected a <${ROOT_ELEMENT}> root element, found <${root.name}>`, {
        path: root.name,
      });
    }

    const prefix = namePrefix(root.name);
    const declared = root.attributes[prefix ? `xmlns:${prefix}` : 'xmlns'];
    if (declared !== PREMIS_NAMESPACE) {
      logger.warn('Document root is not in the PREMIS 3 namespace', {
        source,
        namespace: declared ?? null,
      });
    }

    for (const child of childElements(root)) {
      if (recordKindOf(child) === undefined) {
        logger.warn(`Ignoring unexpected element <${child.name}>`, { source });
      }
    }
  }

  /**
   * Build an importer from document text.
   *
   * @throws DocumentParseError if the text is not a PREMIS document
   */
  static fromXml(
    text: string,
    options: { source?: string; logger?: RecordLogger } = {}
  ): XmlDocumentImporter {
    return new XmlDocumentImporter(
      parseXml(text),
      options.source ?? '<string>',
      options.logger ?? silentLogger
    );
  }

  /**
   * Read and build an importer from a document on disk (or any DocumentReader).
   *
   * @throws ConfigurationError if the document does not exist
   * @throws DocumentParseError if the document is not a PREMIS document
   */
  static async fromFile(path: string, options: ImportOptions = {}): Promise<XmlDocumentImporter> {
    const reader = options.reader ?? createFilesystemReader();
    if (!(await reader.exists(path))) {
      throw new ConfigurationError(`Document not found: ${path}`, { path });
    }
    const text = await reader.readFile(path);
    return XmlDocumentImporter.fromXml(text, { source: path, logger: options.logger });
  }

  findEvents(): PremisEvent[] {
    return this.find('event', elementToEvent);
  }

  findAgents(): PremisAgent[] {
    return this.find('agent', elementToAgent);
  }

  findRights(): PremisRights[] {
    return this.find('rights', elementToRights);
  }

  findObjects(): PremisObject[] {
    return this.find('object', elementToObject);
  }

  private find<T extends PremisRecord>(kind: RecordKind, read: ElementReader<T>): T[] {
    const rootName = localName(this.root.name);
    return childElements(this.root)
      .filter((child) => recordKindOf(child) === kind)
      .map((child, i) => read(child, `${rootName}/${kind}[${i + 1}]`));
  }
}
