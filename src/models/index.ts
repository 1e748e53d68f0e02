// Export all domain models

export * from './types.js';
export * from './snapshot.js';
export * from './change-set.js';
export * from './review.js';
