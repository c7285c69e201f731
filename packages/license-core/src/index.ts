export * from './cells.js';
export * from './combination-aggregator.js';
export * from './combination-key.js';
export * from './errors.js';
export * from './license.js';
export * from './license-resolver.js';
export * from './pipeline.js';
export * from './role-catalog.js';
export * from './summary-builder.js';
export * from './user-role-extractor.js';
