export * from './embedder.service.js';
export * from './embedding-cache.js';
export * from './embedding.module.js';
export * from './embedding.types.js';
export * from './hash-embedding.js';
export * from './vector-math.js';
