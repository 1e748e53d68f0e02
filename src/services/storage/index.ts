/**
 * Storage Module
 *
 * Filesystem persistence of review state and snapshot files.
 *
 * @module services/storage
 */

export * from './review-store.js';
