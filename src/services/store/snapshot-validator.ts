// Entity store invariant checks

import { Snapshot } from '../../models/snapshot.js';
import { MalformedSnapshotError } from '../../core/errors.js';

/**
 * Lists invariant violations of a snapshot (empty when well-formed)
 */
export function findSnapshotProblems(snapshot: Snapshot): string[] {
  const problems: string[] = [];
  const kinds = new Map<string, string>();

  for (const entity of snapshot.entities) {
    if (kinds.has(entity.id)) {
      problems.push(`duplicate entity ${entity.id}`);
    }
    kinds.set(entity.id, entity.kind);
  }

  for (const link of snapshot.links) {
    if (!kinds.has(link.source)) {
      problems.push(`link ${link.source} -> ${link.target} has dangling source`);
    }
    if (!kinds.has(link.target)) {
      problems.push(`link ${link.source} -> ${link.target} has dangling target`);
    }
  }

  for (const allocation of snapshot.allocations) {
    if (!kinds.has(allocation.entityId)) {
      problems.push(`allocation of ${allocation.requirementId} to missing entity ${allocation.entityId}`);
    }
    const requirementKind = kinds.get(allocation.requirementId);
    if (requirementKind === undefined) {
      problems.push(`allocation of missing requirement ${allocation.requirementId}`);
    } else if (requirementKind !== 'requirement') {
      problems.push(`allocated ${allocation.requirementId} is a ${requirementKind}, not a requirement`);
    }
  }

  return problems;
}

/**
 * Throws MalformedSnapshotError when a snapshot breaks the store invariants
 */
export function validateSnapshot(snapshot: Snapshot): void {
  const problems = findSnapshotProblems(snapshot);
  if (problems.length > 0) {
    throw new MalformedSnapshotError(snapshot.version, problems);
  }
}
