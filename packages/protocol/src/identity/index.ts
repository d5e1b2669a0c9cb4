export * from './identifiers.js';
export * from './fingerprint.js';
