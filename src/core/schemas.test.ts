// Tests for Zod schemas

import { describe, it, expect } from 'vitest';
import {
  CommentSchema,
  ConfigSchema,
  ReviewSessionSchema,
  SnapshotSchema,
  describeIssues,
  safeValidateReviewState,
  safeValidateSnapshot
} from './schemas.js';

describe('SnapshotSchema', () => {
  const validSnapshot = {
    version: 'working',
    entities: [
      { id: 'N1', kind: 'node', fields: { description: 'brake fails', fit: 3.5, safe: false, note: null } },
      { id: 'R1', kind: 'requirement' }
    ],
    links: [{ source: 'N1', target: 'R1', kind: 'trace' }],
    allocations: [{ entityId: 'N1', requirementId: 'R1' }]
  };

  it('should validate a valid snapshot', () => {
    expect(SnapshotSchema.safeParse(validSnapshot).success).toBe(true);
  });

  it('should default missing fields, links and allocations', () => {
    const result = SnapshotSchema.parse({ version: 'v', entities: [{ id: 'N1', kind: 'node' }] });
    expect(result.entities[0]?.fields).toEqual({});
    expect(result.links).toEqual([]);
    expect(result.allocations).toEqual([]);
  });

  it('should reject unknown entity kinds', () => {
    const invalid = { ...validSnapshot, entities: [{ id: 'N1', kind: 'gate' }] };
    expect(safeValidateSnapshot(invalid).success).toBe(false);
  });

  it('should reject nested field values', () => {
    const invalid = { ...validSnapshot, entities: [{ id: 'N1', kind: 'node', fields: { a: { b: 1 } } }] };
    expect(safeValidateSnapshot(invalid).success).toBe(false);
  });

  it('should reject an empty entity id', () => {
    const invalid = { ...validSnapshot, entities: [{ id: '', kind: 'node' }] };
    expect(safeValidateSnapshot(invalid).success).toBe(false);
  });
});

describe('CommentSchema', () => {
  const validComment = {
    id: 'C-0001',
    author: { name: 'Alice', email: '', role: 'reviewer' },
    target: 'N1',
    text: 'Check the failure rate',
    createdAt: '2025-03-01T10:00:00.000Z',
    resolved: false
  };

  it('should validate an open comment and coerce dates', () => {
    const result = CommentSchema.parse(validComment);
    expect(result.createdAt).toEqual(new Date('2025-03-01T10:00:00.000Z'));
  });

  it('should require a resolution on resolved comments', () => {
    expect(CommentSchema.safeParse({ ...validComment, resolved: true }).success).toBe(false);
    expect(CommentSchema.safeParse({ ...validComment, resolved: true, resolution: 'fixed' }).success).toBe(true);
  });

  it('should reject a resolution on open comments', () => {
    expect(CommentSchema.safeParse({ ...validComment, resolution: 'fixed' }).success).toBe(false);
  });
});

describe('ReviewSessionSchema', () => {
  const validSession = {
    id: 'REV-0001',
    name: 'Brake FTA review',
    description: '',
    kind: 'joint',
    scope: { entityIds: ['N1'] },
    participants: [{ name: 'Mia', email: 'mia@example.com', role: 'moderator' }],
    dueDate: '2025-04-01T00:00:00.000Z',
    status: 'open',
    baselineSnapshotVersion: null,
    createdAt: '2025-03-01T00:00:00.000Z'
  };

  it('should fill defaults for optional collections', () => {
    const result = ReviewSessionSchema.parse(validSession);
    expect(result.scope.requirementIds).toEqual([]);
    expect(result.completedReviewers).toEqual([]);
    expect(result.comments).toEqual([]);
    expect(result.approval).toBeNull();
  });

  it('should accept an approval without a version label', () => {
    const approval = { approvedBy: 'Ada', approvedAt: '2025-03-10T00:00:00.000Z', version: null };
    expect(ReviewSessionSchema.safeParse({ ...validSession, approval }).success).toBe(true);
  });

  it('should reject unknown statuses', () => {
    expect(ReviewSessionSchema.safeParse({ ...validSession, status: 'closed' }).success).toBe(false);
  });
});

describe('ReviewStateSchema', () => {
  it('should only accept format version 1', () => {
    expect(safeValidateReviewState({ formatVersion: 1 }).success).toBe(true);
    expect(safeValidateReviewState({ formatVersion: 2 }).success).toBe(false);
  });

  it('should reject history entries with a malformed checksum', () => {
    const state = {
      formatVersion: 1,
      history: [{
        sessionId: 'REV-0001',
        approvedAt: '2025-03-10T00:00:00.000Z',
        checksum: 'abc',
        snapshot: { version: 'approved v1', entities: [] }
      }]
    };
    expect(safeValidateReviewState(state).success).toBe(false);
  });
});

describe('ConfigSchema', () => {
  it('should accept an empty configuration', () => {
    expect(ConfigSchema.safeParse({}).success).toBe(true);
  });

  it('should reject non-positive durations', () => {
    expect(ConfigSchema.safeParse({ review: { defaultDurationDays: 0 } }).success).toBe(false);
  });
});

describe('describeIssues', () => {
  it('should prefix each issue with its path', () => {
    const result = ConfigSchema.safeParse({ logging: { level: 'loud' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      const issues = describeIssues(result.error);
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^logging\.level: /);
    }
  });

  it('should label root issues', () => {
    const result = ConfigSchema.safeParse('not an object');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(describeIssues(result.error)[0]).toMatch(/^\(root\): /);
    }
  });
});
