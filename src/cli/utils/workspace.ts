// Loads configuration, model and review state for a CLI invocation

import * as path from 'path';
import { Logger } from '../../core/logger.js';
import { ValidationError } from '../../core/errors.js';
import { Participant } from '../../models/review.js';
import { Role } from '../../models/types.js';
import { RoleSchema } from '../../core/schemas.js';
import { ConfigService, DEFAULT_BASE_DIR } from '../../services/config/config-service.js';
import { DiffService } from '../../services/diff/diff-service.js';
import { EntityStore } from '../../services/store/entity-store.js';
import { ReviewStore } from '../../services/storage/review-store.js';
import { ReviewRegistry } from '../../services/review/review-registry.js';

/**
 * Options shared by every command that touches review state
 */
export interface WorkspaceOptions {
  path: string;
  model: string;
}

export interface Workspace {
  config: ConfigService;
  store: ReviewStore;
  model: EntityStore;
  registry: ReviewRegistry;
  /** Writes the registry state back to disk */
  save(): Promise<void>;
}

export const DEFAULT_MODEL_FILE = 'model.yaml';

export function reviewDir(basePath: string): string {
  return path.join(basePath, DEFAULT_BASE_DIR);
}

/**
 * Applies the configured log level to the shared logger
 */
export async function configureLogging(config: ConfigService): Promise<void> {
  Logger.configure({ level: await config.getLogLevel() });
}

export async function diffServiceFor(config: ConfigService): Promise<DiffService> {
  const { ignoredFields } = await config.getDiffConfig();
  return new DiffService({ ignoredFields });
}

/**
 * Opens the review directory under `options.path` with the model file
 * `options.model` (relative to the base path) as the working model
 */
export async function openWorkspace(options: WorkspaceOptions): Promise<Workspace> {
  const baseDir = reviewDir(options.path);
  const config = new ConfigService({ baseDir });
  await configureLogging(config);

  const store = new ReviewStore({ baseDir });
  const model = EntityStore.fromSnapshot(await store.loadSnapshot(path.resolve(options.path, options.model)));
  const state = await store.loadState();

  const registryOptions = {
    source: model,
    diffService: await diffServiceFor(config),
    defaultDurationDays: await config.getDefaultDurationDays()
  };
  const registry = state
    ? ReviewRegistry.fromState(state, registryOptions)
    : new ReviewRegistry(registryOptions);

  return {
    config,
    store,
    model,
    registry,
    save: () => store.saveState(registry.toState())
  };
}

/**
 * Parses "name:email:role" (email may be empty: "name::role")
 */
export function parseParticipant(spec: string): Participant {
  const parts = spec.split(':');
  if (parts.length !== 3) {
    throw new ValidationError(`Participant must be name:email:role, got "${spec}"`, 'participant');
  }
  const [name = '', email = '', roleName = ''] = parts;
  const role = RoleSchema.safeParse(roleName.trim().toLowerCase());
  if (!role.success) {
    throw new ValidationError(`Unknown role "${roleName}" (moderator, reviewer or approver)`, 'participant');
  }
  const parsedRole: Role = role.data;
  return { name: name.trim(), email: email.trim(), role: parsedRole };
}

/**
 * Splits a comma-separated identifier list
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

/**
 * Commander collector for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
