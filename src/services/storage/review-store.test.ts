// Tests for ReviewStore

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ReviewStore } from './review-store.js';
import { ReviewState } from '../../models/review.js';
import { Snapshot } from '../../models/snapshot.js';
import { createReviewScope } from '../review/review-scope.js';
import { MalformedSnapshotError, StorageError, ValidationError } from '../../core/errors.js';

describe('ReviewStore', () => {
  const rootDir = `./.review-test-store-${process.pid}`;
  const testDir = path.join(rootDir, '.review');
  let store: ReviewStore;

  const model: Snapshot = {
    version: 'working',
    entities: [
      { id: 'N1', kind: 'node', fields: { description: 'brake fails' } },
      { id: 'R1', kind: 'requirement', fields: {} }
    ],
    links: [],
    allocations: [{ entityId: 'N1', requirementId: 'R1' }]
  };

  beforeEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
    store = new ReviewStore({ baseDir: testDir });
    await store.initialize();
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  describe('initialize', () => {
    it('should create a config template and an empty state file', async () => {
      const config = await fs.readFile(path.join(testDir, 'config.yaml'), 'utf-8');
      expect(config).toContain('defaultDurationDays: 14');
      expect(await store.loadState()).toEqual({ sessions: [], history: [] });
    });

    it('should leave existing files alone', async () => {
      await fs.writeFile(path.join(testDir, 'config.yaml'), 'review:\n  defaultDurationDays: 3\n', 'utf-8');
      await store.initialize();
      const config = await fs.readFile(path.join(testDir, 'config.yaml'), 'utf-8');
      expect(config).toBe('review:\n  defaultDurationDays: 3\n');
    });
  });

  describe('state', () => {
    it('should save and load registry state', async () => {
      const state: ReviewState = {
        sessions: [{
          id: 'REV-0001',
          name: 'Brake FTA',
          description: '',
          kind: 'peer',
          scope: createReviewScope(['N1']),
          participants: [{ name: 'Rex', email: '', role: 'reviewer' }],
          dueDate: new Date('2025-03-15T00:00:00.000Z'),
          status: 'open',
          baselineSnapshotVersion: null,
          completedReviewers: [],
          approval: null,
          comments: [],
          createdAt: new Date('2025-03-01T00:00:00.000Z')
        }],
        history: []
      };

      await store.saveState(state);

      expect(await store.loadState()).toEqual(state);
      await expect(fs.access(`${store.getStatePath()}.tmp`)).rejects.toThrow();
    });

    it('should return null when no state was saved', async () => {
      const empty = new ReviewStore({ baseDir: path.join(rootDir, 'nothing') });
      expect(await empty.loadState()).toBeNull();
    });

    it('should reject a malformed state file', async () => {
      await fs.writeFile(store.getStatePath(), 'formatVersion: 1\nsessions: 5\n', 'utf-8');
      await expect(store.loadState()).rejects.toThrow(ValidationError);
    });
  });

  describe('snapshots', () => {
    it('should round-trip a snapshot file', async () => {
      const file = path.join(rootDir, 'models', 'model.yaml');
      await store.saveSnapshot(file, model);
      expect(await store.loadSnapshot(file)).toEqual(model);
    });

    it('should label files without a version as the working model', async () => {
      const file = path.join(rootDir, 'model.json');
      await fs.writeFile(file, JSON.stringify({ entities: [{ id: 'N1', kind: 'node' }] }), 'utf-8');
      expect((await store.loadSnapshot(file)).version).toBe('working');
      expect((await store.loadSnapshot(file, 'old')).version).toBe('old');
    });

    it('should fail with a storage error for missing files', async () => {
      await expect(store.loadSnapshot(path.join(rootDir, 'missing.yaml'))).rejects.toThrow(StorageError);
    });

    it('should refuse snapshots with dangling references', async () => {
      const file = path.join(rootDir, 'broken.yaml');
      await fs.writeFile(
        file,
        'version: v1\nentities:\n  - id: N1\n    kind: node\nlinks:\n  - source: N1\n    target: GHOST\n    kind: trace\n',
        'utf-8'
      );
      await expect(store.loadSnapshot(file)).rejects.toThrow(MalformedSnapshotError);
    });
  });
});
