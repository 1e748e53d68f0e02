// Core type definitions for the review engine

// Entity kinds held in a model snapshot
export type EntityKind = 'node' | 'fmea-row' | 'requirement' | 'architecture-element';

// Edge kinds between entities
export type LinkKind = 'parent-child' | 'connector' | 'trace';

// Participant roles
export type Role = 'moderator' | 'reviewer' | 'approver';

// Review kinds
export type ReviewKind = 'peer' | 'joint';

// Review lifecycle states
export type ReviewStatus = 'open' | 'read-only' | 'approved';

// Change record discriminators, in ChangeSet order
export type ChangeType =
  | 'entity-added'
  | 'entity-removed'
  | 'entity-modified'
  | 'link-added'
  | 'link-removed'
  | 'allocation-added'
  | 'allocation-removed';

// Field values stored on entities
export type FieldValue = string | number | boolean | null;

// Version label of the live, unsaved model
export const WORKING_VERSION = 'working';

// Time source, injectable for due-date checks
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
