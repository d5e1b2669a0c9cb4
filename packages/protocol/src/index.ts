// @premis-kit/protocol
// Data model and document format for PREMIS preservation metadata.
//
// Key concepts:
// - Four entry kinds (object, event, agent, rights) form a closed union
// - Every entry is addressable by one or more (type, value) identifiers
// - Documents are PREMIS 3.0 XML; entries project to and from elements

export * from './types/index.js';
export * from './identity/index.js';
export * from './errors.js';
export * from './logging.js';
export * from './validation/records.js';
export * from './document/index.js';
