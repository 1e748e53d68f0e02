/**
 * Entity Store Module
 *
 * In-memory model owner and snapshot invariant checks.
 *
 * @module services/store
 */

export * from './entity-store.js';
export * from './snapshot-validator.js';
