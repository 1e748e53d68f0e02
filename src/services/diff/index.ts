/**
 * Diff Module
 *
 * Structural and textual comparison of model snapshots.
 *
 * @module services/diff
 */

export * from './diff-service.js';
export * from './text-diff.js';
