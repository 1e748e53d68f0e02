/**
 * Entity Store
 *
 * Working copy of a safety model (fault tree nodes, FMEA rows,
 * requirements, architecture elements) with identifier-based links and
 * requirement allocations. Hands out frozen snapshots for diffing and review.
 */

import { Allocation, Entity, Link, Snapshot, SnapshotSource } from '../../models/snapshot.js';
import { EntityKind, FieldValue, LinkKind, WORKING_VERSION } from '../../models/types.js';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import { validateIdentifier } from '../../core/validation.js';
import { validateSnapshot } from './snapshot-validator.js';

/**
 * Input for adding an entity
 */
export interface EntityInput {
  id: string;
  kind: EntityKind;
  fields?: Record<string, FieldValue>;
}

/**
 * Field patch; `undefined` removes the field
 */
export type FieldPatch = Record<string, FieldValue | undefined>;

function linkKey(source: string, target: string, kind: LinkKind): string {
  return `${source}\u0000${target}\u0000${kind}`;
}

function allocationKey(entityId: string, requirementId: string): string {
  return `${entityId}\u0000${requirementId}`;
}

function freezeEntity(id: string, kind: EntityKind, fields: Record<string, FieldValue>): Entity {
  return Object.freeze({ id, kind, fields: Object.freeze({ ...fields }) });
}

/**
 * Mutable model owner; every read goes through immutable snapshots
 */
export class EntityStore implements SnapshotSource {
  private entities = new Map<string, Entity>();
  private links = new Map<string, Link>();
  private allocations = new Map<string, Allocation>();
  private cached: Snapshot | null = null;

  /**
   * Creates a store holding the contents of a snapshot
   */
  static fromSnapshot(snapshot: Snapshot): EntityStore {
    validateSnapshot(snapshot);
    const store = new EntityStore();
    for (const entity of snapshot.entities) {
      store.entities.set(entity.id, freezeEntity(entity.id, entity.kind, { ...entity.fields }));
    }
    for (const link of snapshot.links) {
      store.links.set(linkKey(link.source, link.target, link.kind), Object.freeze({ ...link }));
    }
    for (const allocation of snapshot.allocations) {
      store.allocations.set(
        allocationKey(allocation.entityId, allocation.requirementId),
        Object.freeze({ ...allocation })
      );
    }
    return store;
  }

  private touch(): void {
    this.cached = null;
  }

  private require(id: string): Entity {
    const entity = this.entities.get(id);
    if (!entity) {
      throw new NotFoundError('Entity', id);
    }
    return entity;
  }

  getEntity(id: string): Entity | undefined {
    return this.entities.get(id);
  }

  hasEntity(id: string): boolean {
    return this.entities.has(id);
  }

  addEntity(input: EntityInput): Entity {
    const id = validateIdentifier(input.id);
    if (this.entities.has(id)) {
      throw new ValidationError(`Entity already exists: ${id}`, 'id');
    }
    const entity = freezeEntity(id, input.kind, input.fields ?? {});
    this.entities.set(id, entity);
    this.touch();
    return entity;
  }

  /**
   * Replaces the entity with a patched copy
   */
  updateFields(id: string, patch: FieldPatch): Entity {
    const current = this.require(id);
    const fields: Record<string, FieldValue> = { ...current.fields };
    for (const [key, value] of Object.entries(patch)) {
      if (value === undefined) {
        delete fields[key];
      } else {
        fields[key] = value;
      }
    }
    const updated = freezeEntity(id, current.kind, fields);
    this.entities.set(id, updated);
    this.touch();
    return updated;
  }

  /**
   * Removes an entity together with its links and allocations
   */
  removeEntity(id: string): void {
    this.require(id);
    this.entities.delete(id);
    for (const [key, link] of this.links) {
      if (link.source === id || link.target === id) {
        this.links.delete(key);
      }
    }
    for (const [key, allocation] of this.allocations) {
      if (allocation.entityId === id || allocation.requirementId === id) {
        this.allocations.delete(key);
      }
    }
    this.touch();
  }

  link(source: string, target: string, kind: LinkKind = 'parent-child'): Link {
    this.require(source);
    this.require(target);
    const key = linkKey(source, target, kind);
    const existing = this.links.get(key);
    if (existing) {
      return existing;
    }
    const link = Object.freeze({ source, target, kind });
    this.links.set(key, link);
    this.touch();
    return link;
  }

  unlink(source: string, target: string, kind: LinkKind = 'parent-child'): boolean {
    const removed = this.links.delete(linkKey(source, target, kind));
    if (removed) {
      this.touch();
    }
    return removed;
  }

  allocate(entityId: string, requirementId: string): Allocation {
    this.require(entityId);
    const requirement = this.require(requirementId);
    if (requirement.kind !== 'requirement') {
      throw new ValidationError(`${requirementId} is not a requirement`, 'requirementId');
    }
    const key = allocationKey(entityId, requirementId);
    const existing = this.allocations.get(key);
    if (existing) {
      return existing;
    }
    const allocation = Object.freeze({ entityId, requirementId });
    this.allocations.set(key, allocation);
    this.touch();
    return allocation;
  }

  deallocate(entityId: string, requirementId: string): boolean {
    const removed = this.allocations.delete(allocationKey(entityId, requirementId));
    if (removed) {
      this.touch();
    }
    return removed;
  }

  /**
   * Direct children through parent-child links
   */
  childrenOf(id: string): string[] {
    const children: string[] = [];
    for (const link of this.links.values()) {
      if (link.source === id && link.kind === 'parent-child') {
        children.push(link.target);
      }
    }
    return children;
  }

  /**
   * Frozen view of the current model; reused until the next mutation
   */
  currentSnapshot(): Snapshot {
    if (!this.cached) {
      this.cached = Object.freeze({
        version: WORKING_VERSION,
        entities: Object.freeze([...this.entities.values()]),
        links: Object.freeze([...this.links.values()]),
        allocations: Object.freeze([...this.allocations.values()])
      });
    }
    return this.cached;
  }
}
