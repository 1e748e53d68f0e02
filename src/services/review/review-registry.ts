/**
 * Review Registry
 *
 * Owns every review session of one model: creation, lookup, approved-version
 * history, comment merges between models and the version selection behind
 * "open review" and "compare versions".
 */

import {
  ApprovedVersion,
  Comment,
  Participant,
  ReviewScope,
  ReviewSessionRecord,
  ReviewState
} from '../../models/review.js';
import { Snapshot, SnapshotSource } from '../../models/snapshot.js';
import { ChangeSet } from '../../models/change-set.js';
import { Clock, ReviewKind, ReviewStatus, WORKING_VERSION, systemClock } from '../../models/types.js';
import {
  DuplicateNameError,
  NotFoundError,
  ReviewLockedError,
  ValidationError
} from '../../core/errors.js';
import { compareStrings, computeSnapshotChecksum, verifySnapshotChecksum } from '../../core/integrity.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { validateReviewName } from '../../core/validation.js';
import { CommentLedger } from '../comments/comment-ledger.js';
import { ChangeSummary, DiffService, IDiffService, summarizeChangeSet } from '../diff/diff-service.js';
import { IdGenerator } from '../id-generator.js';
import { ReviewSession, ReviewSessionOptions } from './review-session.js';
import { scopeTargets } from './review-scope.js';

/**
 * Label of the empty model used as baseline before the first approval
 */
export const INITIAL_VERSION = 'initial';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Label under which the n-th approval is recorded
 */
export function approvedVersionLabel(sequence: number): string {
  return `approved v${sequence}`;
}

/**
 * Registry options
 */
export interface ReviewRegistryOptions {
  /** Live model read when sessions open and approvals are recorded */
  source: SnapshotSource;
  clock?: Clock;
  logger?: Logger;
  diffService?: IDiffService;
  /** Due date offset for sessions created without one (default 14) */
  defaultDurationDays?: number;
}

/**
 * Input for creating a session
 */
export interface CreateSessionInput {
  kind: ReviewKind;
  name: string;
  description?: string;
  scope: ReviewScope;
  participants: readonly Participant[];
  dueDate?: Date;
}

/**
 * Filters for listing sessions
 */
export interface SessionFilters {
  status?: ReviewStatus;
  kind?: ReviewKind;
}

/**
 * Everything the export adapter needs for one review
 */
export interface ReviewBundle {
  session: ReviewSessionRecord;
  changeSet: ChangeSet;
  summary: ChangeSummary;
  comments: readonly Comment[];
  unresolvedTargets: string[];
  pendingReviewers: string[];
}

function emptySnapshot(version: string): Snapshot {
  return Object.freeze({ version, entities: [], links: [], allocations: [] });
}

export class ReviewRegistry {
  private readonly sessions = new Map<string, ReviewSession>();
  private readonly history: ApprovedVersion[] = [];
  private readonly ids = new IdGenerator('review');
  private readonly source: SnapshotSource;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly differ: IDiffService;
  private readonly defaultDurationDays: number;

  constructor(options: ReviewRegistryOptions) {
    this.source = options.source;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child('registry');
    this.differ = options.diffService ?? new DiffService({ logger: options.logger });
    this.defaultDurationDays = options.defaultDurationDays ?? 14;
  }

  /**
   * Rebuilds a registry from persisted state
   *
   * @throws ValidationError when an approved snapshot no longer matches its checksum
   * @throws DuplicateNameError when two stored sessions share a name
   */
  static fromState(state: ReviewState, options: ReviewRegistryOptions): ReviewRegistry {
    const registry = new ReviewRegistry(options);
    for (const entry of state.history) {
      const check = verifySnapshotChecksum(entry.snapshot, entry.checksum);
      if (!check.valid) {
        throw new ValidationError(check.reason ?? 'Checksum mismatch', 'history', {
          version: entry.snapshot.version
        });
      }
      registry.history.push(entry);
    }
    for (const record of state.sessions) {
      if (registry.findByName(record.name)) {
        throw new DuplicateNameError(record.name);
      }
      const session = ReviewSession.fromRecord(record, registry.sessionOptions());
      registry.sessions.set(session.id, session);
      registry.ids.observe(session.id);
    }
    return registry;
  }

  private sessionOptions(): ReviewSessionOptions {
    return {
      clock: this.clock,
      logger: this.log,
      onApproved: (session, approvedAt) => this.recordApproval(session, approvedAt)
    };
  }

  /**
   * Starts a peer or joint review
   *
   * @throws DuplicateNameError when the name is taken
   * @throws InvalidParticipantsError when the role counts are not met
   * @throws NotFoundError when a scoped identifier is not in the current model
   */
  createSession(input: CreateSessionInput): ReviewSession {
    const name = validateReviewName(input.name);
    if (this.findByName(name)) {
      throw new DuplicateNameError(name);
    }
    if (input.scope.entityIds.size === 0) {
      throw new ValidationError('Review scope cannot be empty', 'scope');
    }

    const current = this.source.currentSnapshot();
    const known = new Set(current.entities.map(e => e.id));
    for (const id of scopeTargets(input.scope)) {
      if (!known.has(id)) {
        throw new NotFoundError('Entity', id);
      }
    }

    const dueDate = input.dueDate ?? new Date(this.clock().getTime() + this.defaultDurationDays * DAY_MS);
    const session = new ReviewSession(
      {
        id: this.ids.peek(),
        name,
        description: input.description ?? '',
        kind: input.kind,
        scope: input.scope,
        participants: input.participants,
        dueDate,
        baselineSnapshotVersion: this.latestApproved()?.snapshot.version ?? null
      },
      this.sessionOptions()
    );
    this.ids.next();
    this.sessions.set(session.id, session);

    this.log.info('Created review', {
      id: session.id,
      name,
      kind: input.kind,
      scope: session.scope.entityIds.size,
      dueDate: dueDate.toISOString()
    });
    return session;
  }

  getSession(id: string): ReviewSession | undefined {
    return this.sessions.get(id);
  }

  /**
   * @throws NotFoundError for unknown identifiers
   */
  requireSession(id: string): ReviewSession {
    const session = this.sessions.get(id) ?? this.findByName(id);
    if (!session) {
      throw new NotFoundError('Review', id);
    }
    return session;
  }

  /**
   * Case-insensitive lookup by review name
   */
  findByName(name: string): ReviewSession | undefined {
    const key = name.trim().toLowerCase();
    for (const session of this.sessions.values()) {
      if (session.name.toLowerCase() === key) {
        return session;
      }
    }
    return undefined;
  }

  /**
   * Sessions ordered by identifier
   */
  list(filters: SessionFilters = {}): ReviewSession[] {
    return [...this.sessions.values()]
      .filter(s => filters.kind === undefined || s.kind === filters.kind)
      .filter(s => filters.status === undefined || s.status === filters.status)
      .sort((a, b) => compareStrings(a.id, b.id));
  }

  /**
   * Approval hook: records the current model as the next approved version
   */
  private recordApproval(session: ReviewSession, approvedAt: Date): string {
    const label = approvedVersionLabel(this.history.length + 1);
    const current = this.source.currentSnapshot();
    const snapshot: Snapshot = Object.freeze({ ...current, version: label });
    this.history.push(Object.freeze({
      snapshot,
      sessionId: session.id,
      approvedAt,
      checksum: computeSnapshotChecksum(snapshot)
    }));
    this.log.info('Approved review', { id: session.id, name: session.name, version: label });
    return label;
  }

  /**
   * Approved versions, oldest first
   */
  approvedHistory(): readonly ApprovedVersion[] {
    return [...this.history];
  }

  latestApproved(): ApprovedVersion | undefined {
    return this.history[this.history.length - 1];
  }

  /**
   * Snapshot for a version label: "working" or "approved vN"
   *
   * @throws NotFoundError for unknown labels
   */
  snapshotFor(version: string): Snapshot {
    if (version === WORKING_VERSION) {
      return this.source.currentSnapshot();
    }
    if (version === INITIAL_VERSION) {
      return emptySnapshot(INITIAL_VERSION);
    }
    const entry = this.history.find(h => h.snapshot.version === version);
    if (!entry) {
      throw new NotFoundError('Version', version);
    }
    return entry.snapshot;
  }

  /**
   * Changes a review has to look at: latest approved version (or the empty
   * model) against the working model, restricted to the review scope.
   * Approved sessions keep the baseline they were approved against.
   */
  openSession(id: string): ChangeSet {
    const session = this.requireSession(id);
    if (session.status !== 'approved') {
      session.rebase(this.latestApproved()?.snapshot.version ?? null);
    }
    const baseline = session.baselineSnapshotVersion ?? INITIAL_VERSION;
    const target = session.status === 'approved' && session.approval?.version
      ? session.approval.version
      : WORKING_VERSION;
    return this.compareVersions(baseline, target, scopeTargets(session.scope));
  }

  /**
   * Diffs any two versions through the shared diff entry point
   */
  compareVersions(baseVersion: string, otherVersion: string, scope?: Iterable<string>): ChangeSet {
    return this.differ.diff(this.snapshotFor(baseVersion), this.snapshotFor(otherVersion), scope);
  }

  /**
   * Copies comments from another model's review into a session. Only
   * comments whose target exists in the source model and lies in the
   * target scope are taken; comments with the same target, author and text
   * as one already present are skipped, so repeated merges add nothing.
   *
   * @returns number of comments copied
   * @throws ReviewLockedError when the target session is approved
   */
  mergeComments(sourceSnapshot: Snapshot, sourceLedger: CommentLedger, target: ReviewSession): number {
    if (target.status === 'approved') {
      throw new ReviewLockedError(target.name, 'approved', 'merge comments');
    }
    const known = new Set(sourceSnapshot.entities.map(e => e.id));
    let merged = 0;

    for (const comment of sourceLedger.all()) {
      if (!known.has(comment.target) || !target.comments.isInScope(comment.target)) {
        continue;
      }
      if (target.comments.hasDuplicate(comment)) {
        continue;
      }
      target.comments.importComment(comment);
      merged++;
    }

    this.log.info('Merged comments', {
      from: sourceSnapshot.version,
      into: target.id,
      merged,
      offered: sourceLedger.size
    });
    return merged;
  }

  /**
   * Session summary, comments and change-set for the export adapter
   */
  exportBundle(id: string): ReviewBundle {
    const session = this.requireSession(id);
    const changeSet = this.openSession(session.id);
    return {
      session: session.toRecord(),
      changeSet,
      summary: summarizeChangeSet(changeSet),
      comments: session.comments.all(),
      unresolvedTargets: [...session.comments.unresolvedTargets()].sort(compareStrings),
      pendingReviewers: session.pendingReviewers()
    };
  }

  toState(): ReviewState {
    return {
      sessions: this.list().map(s => s.toRecord()),
      history: [...this.history]
    };
  }
}
