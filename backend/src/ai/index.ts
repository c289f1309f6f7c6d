export * from './ai.constants.js';
export * from './ai.module.js';
export * from './ai.service.js';
export * from './ai.types.js';
export * from './providers/ai-provider.js';
export * from './providers/hash.provider.js';
export * from './providers/openai.provider.js';
