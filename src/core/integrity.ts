// Snapshot integrity and checksum utilities

import { createHash } from 'crypto';
import { Snapshot } from '../models/snapshot.js';

/**
 * Code-unit ordering; independent of the host locale
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Computes a SHA-256 checksum for a snapshot's content
 * The version label is not part of the content
 */
export function computeSnapshotChecksum(snapshot: Snapshot): string {
  const content = JSON.stringify(normalizeSnapshot(snapshot));
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Canonical form: every collection sorted, field keys in fixed order
 */
function normalizeSnapshot(snapshot: Snapshot): Record<string, unknown> {
  const entities = [...snapshot.entities]
    .sort((a, b) => compareStrings(a.id, b.id))
    .map(entity => ({
      id: entity.id,
      kind: entity.kind,
      fields: Object.keys(entity.fields)
        .sort(compareStrings)
        .map(key => [key, entity.fields[key]])
    }));

  const links = snapshot.links
    .map(link => [link.source, link.target, link.kind])
    .sort((a, b) => compareStrings(a.join('\u0000'), b.join('\u0000')));

  const allocations = snapshot.allocations
    .map(allocation => [allocation.entityId, allocation.requirementId])
    .sort((a, b) => compareStrings(a.join('\u0000'), b.join('\u0000')));

  return { entities, links, allocations };
}

/**
 * Compares two snapshots for content equality (ignoring version labels)
 */
export function snapshotsEqual(a: Snapshot, b: Snapshot): boolean {
  return computeSnapshotChecksum(a) === computeSnapshotChecksum(b);
}

/**
 * Verifies a stored checksum against the snapshot it was computed for
 */
export function verifySnapshotChecksum(
  snapshot: Snapshot,
  checksum: string
): { valid: boolean; reason?: string } {
  const current = computeSnapshotChecksum(snapshot);
  if (current !== checksum) {
    return {
      valid: false,
      reason: `Checksum mismatch for "${snapshot.version}": snapshot has been modified`
    };
  }
  return { valid: true };
}
