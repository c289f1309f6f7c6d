import 'reflect-metadata';

export * from './app.module.js';
export * from './ai/index.js';
export * from './config/index.js';
export * from './content/index.js';
export * from './database/index.js';
export * from './embedding/index.js';
export * from './search/index.js';
