// Filesystem and in-memory implementations of DocumentReader and DocumentWriter.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DocumentParseError } from '@premis-kit/protocol';
import type { DocumentEncoding, DocumentReader, DocumentWriter } from './types.js';

const UTF16LE_BOM = [0xff, 0xfe];
const UTF16BE_BOM = [0xfe, 0xff];
const UTF8_BOM = [0xef, 0xbb, 0xbf];

function startsWith(bytes: Uint8Array, prefix: number[]): boolean {
  return prefix.every((byte, i) => bytes[i] === byte);
}

/**
 * Decode document bytes by their byte order mark (UTF-16 of either byte
 * order, or UTF-8), UTF-8 by default.
 */
export function decodeDocument(bytes: Buffer): string {
  if (startsWith(bytes, UTF16LE_BOM)) {
    return bytes.subarray(UTF16LE_BOM.length).toString('utf16le');
  }
  if (startsWith(bytes, UTF16BE_BOM)) {
    const body = Buffer.from(bytes.subarray(UTF16BE_BOM.length));
    if (body.length % 2 !== 0) {
      throw new DocumentParseError('Truncated UTF-16 document');
    }
    return body.swap16().toString('utf16le');
  }
  if (startsWith(bytes, UTF8_BOM)) {
    return bytes.subarray(UTF8_BOM.length).toString('utf-8');
  }
  return bytes.toString('utf-8');
}

/**
 * Encode document text. UTF-16 documents are written little-endian
 * with a byte order mark.
 */
export function encodeDocument(content: string, encoding: DocumentEncoding): Buffer {
  if (encoding === 'UTF-16') {
    return Buffer.concat([Buffer.from(UTF16LE_BOM), Buffer.from(content, 'utf16le')]);
  }
  return Buffer.from(content, 'utf-8');
}

/**
 * Create a DocumentWriter that writes to the local filesystem.
 */
export function createFilesystemWriter(): DocumentWriter {
  return {
    async writeFile(filePath: string, content: string, encoding: DocumentEncoding): Promise<void> {
      // Ensure parent directory exists
      await fs.mkdir(path.dirname(filePath), { recursive: true });

      await fs.writeFile(filePath, encodeDocument(content, encoding));
    },
  };
}

/**
 * Create a DocumentReader that reads from the local filesystem.
 */
export function createFilesystemReader(): DocumentReader {
  return {
    async exists(filePath: string): Promise<boolean> {
      try {
        await fs.access(filePath);
        return true;
      } catch {
        return false;
      }
    },

    async readFile(filePath: string): Promise<string> {
      return decodeDocument(await fs.readFile(filePath));
    },
  };
}

/**
 * Create an in-memory DocumentWriter for testing.
 * Returns the writer, a Map of all written documents and the encoding
 * each was written with.
 */
export function createInMemoryWriter(): {
  writer: DocumentWriter;
  files: Map<string, string>;
  encodings: Map<string, DocumentEncoding>;
} {
  const files = new Map<string, string>();
  const encodings = new Map<string, DocumentEncoding>();

  const writer: DocumentWriter = {
    async writeFile(filePath: string, content: string, encoding: DocumentEncoding): Promise<void> {
      files.set(filePath, content);
      encodings.set(filePath, encoding);
    },
  };

  return { writer, files, encodings };
}

/**
 * Create an in-memory DocumentReader from a Map of documents.
 */
export function createInMemoryReader(files: Map<string, string>): DocumentReader {
  return {
    async exists(filePath: string): Promise<boolean> {
      return files.has(filePath);
    },

    async readFile(filePath: string): Promise<string> {
      const content = files.get(filePath);
      if (content === undefined) {
        throw new Error(`File not found: ${filePath}`);
      }
      return content;
    },
  };
}
