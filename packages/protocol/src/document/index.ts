// PREMIS XML documents: tree model, codec, options and record projections

export * from './tree.js';
export * from './options.js';
export * from './xml.js';
export * from './projection.js';
