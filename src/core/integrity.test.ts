// Integrity tests

import { describe, it, expect } from 'vitest';
import {
  compareStrings,
  computeSnapshotChecksum,
  snapshotsEqual,
  verifySnapshotChecksum
} from './integrity.js';
import { Snapshot } from '../models/snapshot.js';

describe('Integrity', () => {
  const createSnapshot = (overrides: Partial<Snapshot> = {}): Snapshot => ({
    version: 'working',
    entities: [
      { id: 'N1', kind: 'node', fields: { description: 'brake fails', fit: 12 } },
      { id: 'N2', kind: 'node', fields: { description: 'sensor drift' } },
      { id: 'R1', kind: 'requirement', fields: { text: 'detect brake failure' } }
    ],
    links: [{ source: 'N1', target: 'N2', kind: 'parent-child' }],
    allocations: [{ entityId: 'N1', requirementId: 'R1' }],
    ...overrides
  });

  describe('compareStrings', () => {
    it('should order by code unit', () => {
      expect(['b', 'B', 'a', 'A'].sort(compareStrings)).toEqual(['A', 'B', 'a', 'b']);
      expect(compareStrings('N1', 'N1')).toBe(0);
    });
  });

  describe('computeSnapshotChecksum', () => {
    it('should compute consistent checksum for same snapshot', () => {
      expect(computeSnapshotChecksum(createSnapshot())).toBe(computeSnapshotChecksum(createSnapshot()));
    });

    it('should return 64-character hex string', () => {
      expect(computeSnapshotChecksum(createSnapshot())).toMatch(/^[a-f0-9]{64}$/);
    });

    it('should ignore the version label', () => {
      expect(computeSnapshotChecksum(createSnapshot({ version: 'approved v1' })))
        .toBe(computeSnapshotChecksum(createSnapshot({ version: 'working' })));
    });

    it('should ignore entity order and field key order', () => {
      const reordered = createSnapshot({
        entities: [
          { id: 'R1', kind: 'requirement', fields: { text: 'detect brake failure' } },
          { id: 'N2', kind: 'node', fields: { description: 'sensor drift' } },
          { id: 'N1', kind: 'node', fields: { fit: 12, description: 'brake fails' } }
        ]
      });
      expect(computeSnapshotChecksum(reordered)).toBe(computeSnapshotChecksum(createSnapshot()));
    });

    it('should change when a field value changes', () => {
      const changed = createSnapshot({
        entities: [
          { id: 'N1', kind: 'node', fields: { description: 'brake fails', fit: 13 } },
          { id: 'N2', kind: 'node', fields: { description: 'sensor drift' } },
          { id: 'R1', kind: 'requirement', fields: { text: 'detect brake failure' } }
        ]
      });
      expect(computeSnapshotChecksum(changed)).not.toBe(computeSnapshotChecksum(createSnapshot()));
    });

    it('should change when a link kind changes', () => {
      const changed = createSnapshot({ links: [{ source: 'N1', target: 'N2', kind: 'connector' }] });
      expect(snapshotsEqual(changed, createSnapshot())).toBe(false);
    });

    it('should distinguish a string field from a number field', () => {
      const a = createSnapshot({ entities: [{ id: 'N1', kind: 'node', fields: { fit: 12 } }], links: [], allocations: [] });
      const b = createSnapshot({ entities: [{ id: 'N1', kind: 'node', fields: { fit: '12' } }], links: [], allocations: [] });
      expect(snapshotsEqual(a, b)).toBe(false);
    });
  });

  describe('verifySnapshotChecksum', () => {
    it('should accept a matching checksum', () => {
      const snapshot = createSnapshot();
      expect(verifySnapshotChecksum(snapshot, computeSnapshotChecksum(snapshot))).toEqual({ valid: true });
    });

    it('should report a mismatch with the version label', () => {
      const result = verifySnapshotChecksum(createSnapshot({ version: 'approved v2' }), '0'.repeat(64));
      expect(result.valid).toBe(false);
      expect(result.reason).toBe('Checksum mismatch for "approved v2": snapshot has been modified');
    });
  });
});
