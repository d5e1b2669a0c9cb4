// @premis-kit/records
// In-memory PREMIS record sets and their XML documents.
//
// Key concepts:
// - NodeRegistry indexes the entries of one kind by every identifier they carry
// - RecordAggregate owns one registry per kind and is what callers work with
// - Documents are read through DocumentImporter and written in one pass

export * from './registry/node-registry.js';
export * from './aggregate/record-aggregate.js';
export * from './document/index.js';
