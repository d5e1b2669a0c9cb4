// PREMIS document constants and serialization options

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { formatIssuePath } from '../validation/records.js';

export const PREMIS_NAMESPACE = 'http://www.loc.gov/premis/v3';
export const XSI_NAMESPACE = 'http://www.w3.org/2001/XMLSchema-instance';
export const PREMIS_VERSION = '3.0';
export const ROOT_ELEMENT = 'premis';

/**
 * Options controlling how a record set is written as a document.
 * Passed explicitly to every export call.
 */
export type DocumentOptions = {
  /**
   * Prefix bound to the PREMIS namespace ('' writes unprefixed elements
   * in the default namespace)
   */
  prefix: string;

  /**
   * Namespace URI of the primary schema
   */
  namespace: string;

  /**
   * Prefix bound to the XML Schema instance namespace
   */
  xsiPrefix: string;

  xsiNamespace: string;

  /**
   * Value of the root version attribute
   */
  version: string;

  /**
   * Write the <?xml ...?> declaration header
   */
  xmlDeclaration: boolean;

  /**
   * Encoding named in the declaration and used when writing files
   */
  encoding: 'UTF-8' | 'UTF-16';

  /**
   * Indentation per level ('' writes the document on one line)
   */
  indent: string;
};

export const DEFAULT_DOCUMENT_OPTIONS: Readonly<DocumentOptions> = Object.freeze({
  prefix: 'premis',
  namespace: PREMIS_NAMESPACE,
  xsiPrefix: 'xsi',
  xsiNamespace: XSI_NAMESPACE,
  version: PREMIS_VERSION,
  xmlDeclaration: true,
  encoding: 'UTF-8',
  indent: '  ',
});

const xmlPrefix = z.string().regex(/^([A-Za-z_][\w.-]*)?$/, 'must be a valid XML namespace prefix');

const documentOptionsSchema = z
  .object({
    prefix: xmlPrefix,
    namespace: z.string().min(1),
    xsiPrefix: xmlPrefix.refine((value) => value !== '', 'must not be empty'),
    xsiNamespace: z.string().min(1),
    version: z.string().min(1),
    xmlDeclaration: z.boolean(),
    encoding: z.enum(['UTF-8', 'UTF-16']),
    indent: z.string().regex(/^[ \t]*$/, 'must contain only spaces and tabs'),
  })
  .partial()
  .strict();

/**
 * Merge caller overrides onto the defaults.
 *
 * @throws ConfigurationError if an override is malformed or unknown
 */
export function resolveDocumentOptions(overrides: Partial<DocumentOptions> = {}): DocumentOptions {
  const parsed = documentOptionsSchema.safeParse(overrides);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = formatIssuePath(issue.path);
    throw new ConfigurationError(
      `Invalid document option${field ? ` "${field}"` : ''}: ${issue.message}`,
      { issues: parsed.error.issues }
    );
  }

  const resolved: DocumentOptions = { ...DEFAULT_DOCUMENT_OPTIONS };
  for (const [key, value] of Object.entries(parsed.data)) {
    if (value !== undefined) {
      Object.assign(resolved, { [key]: value });
    }
  }

  if (resolved.prefix === resolved.xsiPrefix) {
    throw new ConfigurationError('The PREMIS and XSI namespaces need different prefixes', {
      prefix: resolved.prefix,
    });
  }

  return resolved;
}
