/**
 * Serialization Module
 *
 * YAML persistence of review state and model snapshots.
 *
 * @module services/serialization
 */

export * from './serializer.js';
export * from './deserializer.js';
