// Re-export all protocol types

export * from './common.js';
export * from './objects.js';
export * from './events.js';
export * from './agents.js';
export * from './rights.js';
export * from './records.js';
