/**
 * Tests for review state and snapshot serialization
 */

import { describe, it, expect } from 'vitest';
import { serializeReviewState, serializeSnapshot } from './serializer.js';
import { deserializeReviewState, deserializeSnapshot } from './deserializer.js';
import { ReviewState } from '../../models/review.js';
import { Snapshot } from '../../models/snapshot.js';
import { createReviewScope } from '../review/review-scope.js';
import { computeSnapshotChecksum } from '../../core/integrity.js';
import { ValidationError } from '../../core/errors.js';

const approvedModel: Snapshot = {
  version: 'approved v1',
  entities: [
    { id: 'N1', kind: 'node', fields: { description: 'brake fails', fit: 12, safe: false, note: null } },
    { id: 'R1', kind: 'requirement', fields: { text: 'detect brake failure' } }
  ],
  links: [],
  allocations: [{ entityId: 'N1', requirementId: 'R1' }]
};

const state: ReviewState = {
  sessions: [
    {
      id: 'REV-0001',
      name: 'Brake FTA',
      description: 'First round',
      kind: 'joint',
      scope: createReviewScope(['N1'], ['R1']),
      participants: [
        { name: 'Mia', email: 'mia@example.com', role: 'moderator' },
        { name: 'Rex', email: '', role: 'reviewer' },
        { name: 'Ada', email: '', role: 'approver' }
      ],
      dueDate: new Date('2025-03-15T00:00:00.000Z'),
      status: 'approved',
      baselineSnapshotVersion: null,
      completedReviewers: ['Rex'],
      approval: {
        approvedBy: 'Ada',
        approvedAt: new Date('2025-03-10T12:00:00.000Z'),
        version: 'approved v1'
      },
      comments: [
        {
          id: 'C-0001',
          author: { name: 'Rex', email: '', role: 'reviewer' },
          target: 'N1',
          field: 'fit',
          text: 'FIT: too low?',
          createdAt: new Date('2025-03-02T09:00:00.000Z'),
          resolved: true,
          resolution: 'Checked against field data',
          resolvedAt: new Date('2025-03-03T09:00:00.000Z')
        },
        {
          id: 'C-0002',
          author: { name: 'Rex', email: '', role: 'reviewer' },
          target: 'R1',
          text: 'Wording',
          createdAt: new Date('2025-03-04T09:00:00.000Z'),
          resolved: false,
          reopens: 'C-0001'
        }
      ],
      createdAt: new Date('2025-03-01T00:00:00.000Z')
    }
  ],
  history: [
    {
      snapshot: approvedModel,
      sessionId: 'REV-0001',
      approvedAt: new Date('2025-03-10T12:00:00.000Z'),
      checksum: computeSnapshotChecksum(approvedModel)
    }
  ]
};

describe('review state', () => {
  it('should round-trip sessions, comments and history', () => {
    expect(deserializeReviewState(serializeReviewState(state))).toEqual(state);
  });

  it('should write the format version and ISO dates', () => {
    const text = serializeReviewState(state);
    expect(text.startsWith('formatVersion: 1\n')).toBe(true);
    expect(text).toMatch(/^ +dueDate: "?2025-03-15T00:00:00\.000Z"?$/m);
  });

  it('should read an empty document body as empty state', () => {
    expect(deserializeReviewState('formatVersion: 1\n')).toEqual({ sessions: [], history: [] });
  });

  it('should reject an unknown format version', () => {
    expect(() => deserializeReviewState('formatVersion: 2\nsessions: []\n')).toThrow(ValidationError);
  });

  it('should turn YAML syntax errors into validation errors', () => {
    try {
      deserializeReviewState('formatVersion: 1\nsessions: [\n');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message.startsWith('Invalid review state: ')).toBe(true);
      }
    }
  });

  it('should reject a resolved comment without explanation', () => {
    const text = serializeReviewState(state).replace(/^ +resolution: .*\n/m, '');
    expect(() => deserializeReviewState(text)).toThrow(
      'Resolution explanation must be present exactly when the comment is resolved'
    );
  });
});

describe('snapshots', () => {
  it('should round-trip field values of every type', () => {
    expect(deserializeSnapshot(serializeSnapshot(approvedModel))).toEqual(approvedModel);
  });

  it('should read JSON and default missing collections', () => {
    const snapshot = deserializeSnapshot('{"version": "v2", "entities": [{"id": "N1", "kind": "node"}]}');
    expect(snapshot).toEqual({
      version: 'v2',
      entities: [{ id: 'N1', kind: 'node', fields: {} }],
      links: [],
      allocations: []
    });
  });

  it('should fill in the fallback version only when none is given', () => {
    expect(deserializeSnapshot('entities: []\n', 'working').version).toBe('working');
    expect(deserializeSnapshot('version: v3\nentities: []\n', 'working').version).toBe('v3');
    expect(() => deserializeSnapshot('entities: []\n')).toThrow(ValidationError);
  });

  it('should name the offending path', () => {
    expect(() => deserializeSnapshot('version: v1\nentities:\n  - id: N1\n    kind: gate\n')).toThrow(
      /entities\.0\.kind/
    );
  });
});
