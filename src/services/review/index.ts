/**
 * Review Module
 *
 * Review session state machine, role permissions, scope construction and
 * the registry that owns sessions and approved-version history.
 *
 * @module services/review
 */

export * from './permissions.js';
export * from './review-scope.js';
export * from './review-session.js';
export * from './review-registry.js';
