export * from './search-engine.service.js';
export * from './search.constants.js';
export * from './search.errors.js';
export * from './search.module.js';
export * from './search.schema.js';
export * from './search.types.js';
export * from './similarity-ranker.js';
