/**
 * Configuration Service
 *
 * Loads and provides access to configuration from .review/config.yaml:
 * default review duration, fields excluded from diffs, and the log level.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ReviewConfig, describeIssues, safeValidateConfig } from '../../core/schemas.js';
import { ValidationError } from '../../core/errors.js';
import { LogLevel, parseLogLevel } from '../../core/logger.js';

/**
 * Review defaults
 */
export interface ReviewDefaults {
  defaultDurationDays: number;
}

/**
 * Diff settings
 */
export interface DiffConfig {
  ignoredFields: string[];
}

export const DEFAULT_BASE_DIR = '.review';

const DEFAULT_REVIEW_CONFIG: ReviewDefaults = {
  defaultDurationDays: 14
};

/**
 * Configuration Service
 *
 * Missing files yield the defaults; a file that exists but does not match
 * the schema is rejected.
 */
export class ConfigService {
  private baseDir: string;
  private configPath: string;
  private cachedConfig: ReviewConfig | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.baseDir = options.baseDir || DEFAULT_BASE_DIR;
    this.configPath = path.join(this.baseDir, 'config.yaml');
  }

  /**
   * Load configuration from file, with caching
   *
   * @throws ValidationError when the file is not valid YAML or breaks the schema
   */
  async loadConfig(): Promise<ReviewConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.cachedConfig = {};
        return this.cachedConfig;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`Invalid configuration file ${this.configPath}: ${reason}`, 'config');
    }

    const result = safeValidateConfig(parsed ?? {});
    if (!result.success) {
      const issues = describeIssues(result.error);
      throw new ValidationError(
        `Invalid configuration file ${this.configPath}: ${issues.join('; ')}`,
        'config',
        { issues }
      );
    }

    this.cachedConfig = result.data;
    return result.data;
  }

  /**
   * Clear the cached configuration (after external edits)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async getReviewConfig(): Promise<ReviewDefaults> {
    const config = await this.loadConfig();
    return {
      defaultDurationDays: config.review?.defaultDurationDays ?? DEFAULT_REVIEW_CONFIG.defaultDurationDays
    };
  }

  async getDefaultDurationDays(): Promise<number> {
    const review = await this.getReviewConfig();
    return review.defaultDurationDays;
  }

  async getDiffConfig(): Promise<DiffConfig> {
    const config = await this.loadConfig();
    return {
      ignoredFields: [...(config.diff?.ignoredFields ?? [])]
    };
  }

  /**
   * Configured log level (INFO when unset)
   */
  async getLogLevel(): Promise<LogLevel> {
    const config = await this.loadConfig();
    const name = config.logging?.level;
    return (name !== undefined ? parseLogLevel(name) : undefined) ?? LogLevel.INFO;
  }

  /**
   * Save configuration to file
   */
  async saveConfig(config: ReviewConfig): Promise<void> {
    const result = safeValidateConfig(config);
    if (!result.success) {
      throw new ValidationError(`Invalid configuration: ${describeIssues(result.error).join('; ')}`, 'config');
    }
    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.writeFile(this.configPath, yaml.stringify(result.data), 'utf-8');
    this.cachedConfig = result.data;
  }

  /**
   * Update configuration sections; sections not given are kept
   */
  async updateConfig(updates: Partial<ReviewConfig>): Promise<void> {
    const currentConfig = await this.loadConfig();
    const newConfig: ReviewConfig = {
      ...currentConfig,
      ...(updates.review ? { review: { ...currentConfig.review, ...updates.review } } : {}),
      ...(updates.diff ? { diff: { ...currentConfig.diff, ...updates.diff } } : {}),
      ...(updates.logging ? { logging: { ...currentConfig.logging, ...updates.logging } } : {})
    };
    await this.saveConfig(newConfig);
  }
}
