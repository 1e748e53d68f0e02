// Change-set model produced by the diff engine

import { Allocation, Entity, Link } from './snapshot.js';
import { EntityKind, FieldValue } from './types.js';

/**
 * Text delta: old = prefix + deleted + suffix, new = prefix + inserted + suffix
 */
export interface TextDiff {
  readonly prefix: string;
  readonly deleted: string;
  readonly inserted: string;
  readonly suffix: string;
}

/**
 * One changed field of a modified entity. `before`/`after` are absent
 * when the field did not exist on that side.
 */
export interface FieldChange {
  readonly field: string;
  readonly before?: FieldValue;
  readonly after?: FieldValue;
  readonly text: TextDiff;
}

export interface EntityAdded {
  readonly type: 'entity-added';
  readonly entity: Entity;
}

export interface EntityRemoved {
  readonly type: 'entity-removed';
  readonly entity: Entity;
}

export interface EntityModified {
  readonly type: 'entity-modified';
  readonly entityId: string;
  readonly kind: EntityKind;
  /** Set when the entity changed kind between versions */
  readonly previousKind?: EntityKind;
  readonly fields: readonly FieldChange[];
}

export interface LinkAdded {
  readonly type: 'link-added';
  readonly link: Link;
}

export interface LinkRemoved {
  readonly type: 'link-removed';
  readonly link: Link;
}

export interface AllocationAdded {
  readonly type: 'allocation-added';
  readonly allocation: Allocation;
}

export interface AllocationRemoved {
  readonly type: 'allocation-removed';
  readonly allocation: Allocation;
}

export type ChangeRecord =
  | EntityAdded
  | EntityRemoved
  | EntityModified
  | LinkAdded
  | LinkRemoved
  | AllocationAdded
  | AllocationRemoved;

/**
 * Ordered, deterministic description of the differences between two snapshots
 */
export interface ChangeSet {
  readonly fromVersion: string;
  readonly toVersion: string;
  readonly changes: readonly ChangeRecord[];
}
