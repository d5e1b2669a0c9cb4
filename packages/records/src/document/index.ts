// Document import/export functionality.
// Reads and writes record sets as PREMIS XML documents.

export * from './types.js';
export * from './fs.js';
export * from './import.js';
export * from './export.js';
