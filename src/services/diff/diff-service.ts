/**
 * Diff Service
 *
 * Compares two model snapshots and produces a deterministic change-set:
 * added/removed/modified entities, added/removed links and requirement
 * allocation changes. Used both when a review opens (against the last
 * approved version) and by "Compare Versions".
 */

import { Allocation, Entity, Link, Snapshot } from '../../models/snapshot.js';
import {
  AllocationAdded,
  AllocationRemoved,
  ChangeRecord,
  ChangeSet,
  EntityModified,
  FieldChange
} from '../../models/change-set.js';
import { ChangeType, FieldValue } from '../../models/types.js';
import { compareStrings } from '../../core/integrity.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { validateSnapshot } from '../store/snapshot-validator.js';
import { fieldText, textDiff } from './text-diff.js';

/**
 * Options for a comparison
 */
export interface DiffOptions {
  /** Restrict the comparison to these entity identifiers */
  scope?: Iterable<string>;
  /** Field names excluded from entity comparison */
  ignoredFields?: readonly string[];
}

/**
 * Counts per change type
 */
export type ChangeSummary = Record<ChangeType, number> & { total: number };

function linkKey(link: Link): string {
  return `${link.source}\u0000${link.target}\u0000${link.kind}`;
}

function compareLinks(a: Link, b: Link): number {
  return compareStrings(a.source, b.source)
    || compareStrings(a.target, b.target)
    || compareStrings(a.kind, b.kind);
}

function valuesEqual(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  return a === b || (typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b));
}

/**
 * Field-by-field comparison of one entity present in both versions
 */
function compareFields(before: Entity, after: Entity, ignored: ReadonlySet<string>): FieldChange[] {
  const keys = new Set([...Object.keys(before.fields), ...Object.keys(after.fields)]);
  const changes: FieldChange[] = [];

  for (const field of [...keys].sort(compareStrings)) {
    if (ignored.has(field)) {
      continue;
    }
    const hadField = Object.prototype.hasOwnProperty.call(before.fields, field);
    const hasField = Object.prototype.hasOwnProperty.call(after.fields, field);
    const oldValue = hadField ? before.fields[field] : undefined;
    const newValue = hasField ? after.fields[field] : undefined;

    if (hadField === hasField && valuesEqual(oldValue, newValue)) {
      continue;
    }

    changes.push({
      field,
      ...(hadField ? { before: oldValue } : {}),
      ...(hasField ? { after: newValue } : {}),
      text: textDiff(fieldText(oldValue), fieldText(newValue))
    });
  }

  return changes;
}

function allocationsByEntity(
  allocations: readonly Allocation[],
  inScope: (id: string) => boolean
): Map<string, Set<string>> {
  const byEntity = new Map<string, Set<string>>();
  for (const allocation of allocations) {
    if (!inScope(allocation.entityId)) {
      continue;
    }
    let requirements = byEntity.get(allocation.entityId);
    if (!requirements) {
      requirements = new Set();
      byEntity.set(allocation.entityId, requirements);
    }
    requirements.add(allocation.requirementId);
  }
  return byEntity;
}

/**
 * Compares two snapshots.
 *
 * Ordering: added entities, removed entities, modified entities (each by
 * identifier), added links, removed links (by source, target, kind), then
 * allocation changes (by entity; additions before removals; by requirement).
 *
 * @throws MalformedSnapshotError when either snapshot breaks the store invariants
 */
export function diffSnapshots(
  oldSnapshot: Snapshot,
  newSnapshot: Snapshot,
  options: DiffOptions = {}
): ChangeSet {
  validateSnapshot(oldSnapshot);
  validateSnapshot(newSnapshot);

  const scope = options.scope ? new Set(options.scope) : null;
  const inScope = (id: string): boolean => scope === null || scope.has(id);
  const ignored = new Set(options.ignoredFields ?? []);

  const oldEntities = new Map(oldSnapshot.entities.filter(e => inScope(e.id)).map((e): [string, Entity] => [e.id, e]));
  const newEntities = new Map(newSnapshot.entities.filter(e => inScope(e.id)).map((e): [string, Entity] => [e.id, e]));

  const changes: ChangeRecord[] = [];

  // Entities
  const addedIds = [...newEntities.keys()].filter(id => !oldEntities.has(id)).sort(compareStrings);
  const removedIds = [...oldEntities.keys()].filter(id => !newEntities.has(id)).sort(compareStrings);
  const commonIds = [...newEntities.keys()].filter(id => oldEntities.has(id)).sort(compareStrings);

  for (const id of addedIds) {
    const entity = newEntities.get(id);
    if (entity) changes.push({ type: 'entity-added', entity });
  }
  for (const id of removedIds) {
    const entity = oldEntities.get(id);
    if (entity) changes.push({ type: 'entity-removed', entity });
  }
  for (const id of commonIds) {
    const before = oldEntities.get(id);
    const after = newEntities.get(id);
    if (!before || !after) continue;

    const fields = compareFields(before, after, ignored);
    if (fields.length === 0 && before.kind === after.kind) {
      continue;
    }
    const record: EntityModified = {
      type: 'entity-modified',
      entityId: id,
      kind: after.kind,
      ...(before.kind !== after.kind ? { previousKind: before.kind } : {}),
      fields
    };
    changes.push(record);
  }

  // Links: presence only, in scope when either endpoint is
  const linkInScope = (link: Link): boolean => inScope(link.source) || inScope(link.target);
  const oldLinks = new Map(oldSnapshot.links.filter(linkInScope).map((l): [string, Link] => [linkKey(l), l]));
  const newLinks = new Map(newSnapshot.links.filter(linkInScope).map((l): [string, Link] => [linkKey(l), l]));

  const addedLinks = [...newLinks].filter(([key]) => !oldLinks.has(key)).map(([, l]) => l).sort(compareLinks);
  const removedLinks = [...oldLinks].filter(([key]) => !newLinks.has(key)).map(([, l]) => l).sort(compareLinks);

  for (const link of addedLinks) {
    changes.push({ type: 'link-added', link });
  }
  for (const link of removedLinks) {
    changes.push({ type: 'link-removed', link });
  }

  // Requirement allocations: set difference per entity
  const oldAllocations = allocationsByEntity(oldSnapshot.allocations, inScope);
  const newAllocations = allocationsByEntity(newSnapshot.allocations, inScope);
  const allocatedIds = new Set([...oldAllocations.keys(), ...newAllocations.keys()]);

  for (const entityId of [...allocatedIds].sort(compareStrings)) {
    const before = oldAllocations.get(entityId) ?? new Set<string>();
    const after = newAllocations.get(entityId) ?? new Set<string>();

    const added: AllocationAdded[] = [...after]
      .filter(requirementId => !before.has(requirementId))
      .sort(compareStrings)
      .map((requirementId): AllocationAdded => ({ type: 'allocation-added', allocation: { entityId, requirementId } }));
    const removed: AllocationRemoved[] = [...before]
      .filter(requirementId => !after.has(requirementId))
      .sort(compareStrings)
      .map((requirementId): AllocationRemoved => ({ type: 'allocation-removed', allocation: { entityId, requirementId } }));

    changes.push(...added, ...removed);
  }

  return {
    fromVersion: oldSnapshot.version,
    toVersion: newSnapshot.version,
    changes
  };
}

/**
 * Counts records per change type
 */
export function summarizeChangeSet(changeSet: ChangeSet): ChangeSummary {
  const summary: ChangeSummary = {
    'entity-added': 0,
    'entity-removed': 0,
    'entity-modified': 0,
    'link-added': 0,
    'link-removed': 0,
    'allocation-added': 0,
    'allocation-removed': 0,
    total: changeSet.changes.length
  };
  for (const change of changeSet.changes) {
    summary[change.type]++;
  }
  return summary;
}

/**
 * Identifier a change record refers to (entity, link source, or allocated entity)
 */
export function changeSubject(change: ChangeRecord): string {
  switch (change.type) {
    case 'entity-added':
    case 'entity-removed':
      return change.entity.id;
    case 'entity-modified':
      return change.entityId;
    case 'link-added':
    case 'link-removed':
      return change.link.source;
    case 'allocation-added':
    case 'allocation-removed':
      return change.allocation.entityId;
  }
}

/**
 * Diff Service Interface
 */
export interface IDiffService {
  diff(oldSnapshot: Snapshot, newSnapshot: Snapshot, scope?: Iterable<string>): ChangeSet;
}

/**
 * Diff Service Implementation
 *
 * Applies configured field exclusions to every comparison.
 */
export class DiffService implements IDiffService {
  private readonly ignoredFields: readonly string[];
  private readonly log: Logger;

  constructor(options: { ignoredFields?: readonly string[]; logger?: Logger } = {}) {
    this.ignoredFields = options.ignoredFields ?? [];
    this.log = (options.logger ?? rootLogger).child('diff');
  }

  diff(oldSnapshot: Snapshot, newSnapshot: Snapshot, scope?: Iterable<string>): ChangeSet {
    const changeSet = diffSnapshots(oldSnapshot, newSnapshot, {
      scope,
      ignoredFields: this.ignoredFields
    });
    this.log.debug('Compared snapshots', {
      from: changeSet.fromVersion,
      to: changeSet.toVersion,
      changes: changeSet.changes.length
    });
    return changeSet;
  }
}
