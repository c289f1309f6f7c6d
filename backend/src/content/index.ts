export * from './content.errors.js';
export * from './content.module.js';
export * from './content.schema.js';
export * from './content.store.js';
export * from './content.types.js';
export * from './in-memory-content.store.js';
export * from './postgres-content.store.js';
