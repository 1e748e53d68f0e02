/**
 * Comments Module
 *
 * Comment threads and resolution tracking for reviews.
 *
 * @module services/comments
 */

export * from './comment-ledger.js';
