// Export all services

export * from './id-generator.js';
export * from './store/index.js';
export * from './diff/index.js';
export * from './comments/index.js';
export * from './review/index.js';
export * from './serialization/index.js';
export * from './storage/index.js';
export * from './config/index.js';
