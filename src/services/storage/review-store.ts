// File store for review state and model snapshots

import * as fs from 'fs/promises';
import * as path from 'path';
import { ReviewState } from '../../models/review.js';
import { Snapshot } from '../../models/snapshot.js';
import { StorageError } from '../../core/errors.js';
import { serializeReviewState, serializeSnapshot } from '../serialization/serializer.js';
import { deserializeReviewState, deserializeSnapshot } from '../serialization/deserializer.js';
import { validateSnapshot } from '../store/snapshot-validator.js';

/**
 * Configuration for the review store
 */
export interface ReviewStoreConfig {
  /** Base directory for review state (default: .review) */
  baseDir: string;
  /** File name of the registry state inside baseDir */
  stateFile: string;
}

const DEFAULT_CONFIG: ReviewStoreConfig = {
  baseDir: '.review',
  stateFile: 'reviews.yaml'
};

const CONFIG_TEMPLATE = [
  '# Safety review configuration',
  'review:',
  '  defaultDurationDays: 14',
  'diff:',
  '  ignoredFields: []',
  'logging:',
  '  level: info',
  ''
].join('\n');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Persists registry state and reads/writes snapshot files
 */
export class ReviewStore {
  private config: ReviewStoreConfig;

  constructor(config: Partial<ReviewStoreConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Creates the base directory, a default config file and an empty state file
   * (existing files are left as they are)
   */
  async initialize(): Promise<void> {
    await fs.mkdir(this.config.baseDir, { recursive: true });

    const configPath = path.join(this.config.baseDir, 'config.yaml');
    if (!(await this.exists(configPath))) {
      await fs.writeFile(configPath, CONFIG_TEMPLATE, 'utf-8');
    }

    if (!(await this.exists(this.getStatePath()))) {
      await this.saveState({ sessions: [], history: [] });
    }
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  getBaseDir(): string {
    return this.config.baseDir;
  }

  getStatePath(): string {
    return path.join(this.config.baseDir, this.config.stateFile);
  }

  /**
   * Writes the registry state; the file is replaced atomically
   */
  async saveState(state: ReviewState): Promise<void> {
    const filePath = this.getStatePath();
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp`;
    await fs.writeFile(tempPath, serializeReviewState(state), 'utf-8');
    await fs.rename(tempPath, filePath);
  }

  /**
   * Reads the registry state
   *
   * @returns The state or null when nothing has been saved yet
   * @throws ValidationError when the file is malformed
   */
  async loadState(): Promise<ReviewState | null> {
    try {
      const content = await fs.readFile(this.getStatePath(), 'utf-8');
      return deserializeReviewState(content);
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Loads a snapshot file (YAML or JSON); files without a version label are
   * read as the working model
   *
   * @throws StorageError when the file does not exist
   * @throws ValidationError / MalformedSnapshotError for bad content
   */
  async loadSnapshot(filePath: string, fallbackVersion: string = 'working'): Promise<Snapshot> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new StorageError(`Snapshot file not found: ${filePath}`, { path: filePath });
      }
      throw error;
    }
    const snapshot = deserializeSnapshot(content, fallbackVersion);
    validateSnapshot(snapshot);
    return snapshot;
  }

  async saveSnapshot(filePath: string, snapshot: Snapshot): Promise<void> {
    validateSnapshot(snapshot);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, serializeSnapshot(snapshot), 'utf-8');
  }
}
