// Review scope construction

import { ReviewScope } from '../../models/review.js';
import { Snapshot } from '../../models/snapshot.js';
import { NotFoundError } from '../../core/errors.js';

/**
 * Freezes a set of entity and requirement identifiers
 */
export function createReviewScope(
  entityIds: Iterable<string>,
  requirementIds: Iterable<string> = []
): ReviewScope {
  return Object.freeze({
    entityIds: new Set(entityIds),
    requirementIds: new Set(requirementIds)
  });
}

/**
 * Scope covering whole fault trees / FMEA tables: every entity reachable
 * from the roots through parent-child links, plus the requirements
 * allocated to them.
 *
 * @throws NotFoundError when a root is not in the snapshot
 */
export function expandScope(snapshot: Snapshot, rootIds: Iterable<string>): ReviewScope {
  const known = new Set(snapshot.entities.map(e => e.id));
  const children = new Map<string, string[]>();
  for (const link of snapshot.links) {
    if (link.kind !== 'parent-child') continue;
    const list = children.get(link.source) ?? [];
    list.push(link.target);
    children.set(link.source, list);
  }

  const reached = new Set<string>();
  const queue: string[] = [];
  for (const root of rootIds) {
    if (!known.has(root)) {
      throw new NotFoundError('Entity', root);
    }
    queue.push(root);
  }

  // Fault trees may share subtrees or contain cycles
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || reached.has(id)) continue;
    reached.add(id);
    queue.push(...(children.get(id) ?? []));
  }

  const requirements = snapshot.allocations
    .filter(a => reached.has(a.entityId))
    .map(a => a.requirementId);

  return createReviewScope(reached, requirements);
}

/**
 * Every identifier a comment may target
 */
export function scopeTargets(scope: ReviewScope): Set<string> {
  return new Set([...scope.entityIds, ...scope.requirementIds]);
}
