// Entity store data model

import { EntityKind, FieldValue, LinkKind } from './types.js';

/**
 * A versioned model element: fault tree node, FMEA row, requirement or
 * architecture element
 */
export interface Entity {
  /** Stable identifier, kept across versions */
  readonly id: string;
  readonly kind: EntityKind;
  /** Named fields (description, rationale, asil, fit, ...) */
  readonly fields: Readonly<Record<string, FieldValue>>;
}

/**
 * Edge between two entities, referenced by identifier
 */
export interface Link {
  readonly source: string;
  readonly target: string;
  readonly kind: LinkKind;
}

/**
 * Allocation of a requirement to an entity
 */
export interface Allocation {
  readonly entityId: string;
  readonly requirementId: string;
}

/**
 * Immutable model state at one version
 */
export interface Snapshot {
  /** Version marker, e.g. "approved v3" or "working" */
  readonly version: string;
  readonly entities: readonly Entity[];
  readonly links: readonly Link[];
  readonly allocations: readonly Allocation[];
}

/**
 * Read accessor for the live model
 */
export interface SnapshotSource {
  currentSnapshot(): Snapshot;
}
