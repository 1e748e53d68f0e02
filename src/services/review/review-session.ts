/**
 * Review Session
 *
 * Lifecycle of one peer or joint review:
 *
 *   open ──(due date passes)──▶ read-only ──(moderator extends)──▶ open
 *     └──────────(approver approves, joint only)──────────▶ approved
 *
 * Role checks come first, then the read-only/approved lock, then the
 * approval preconditions.
 */

import {
  ApprovalRecord,
  Comment,
  Participant,
  ReviewScope,
  ReviewSessionRecord
} from '../../models/review.js';
import { Clock, ReviewKind, ReviewStatus, systemClock } from '../../models/types.js';
import {
  ApprovalBlockedError,
  PermissionDeniedError,
  ReviewLockedError,
  ValidationError
} from '../../core/errors.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { MAX_LENGTHS, sanitizeText } from '../../core/validation.js';
import { CommentLedger } from '../comments/comment-ledger.js';
import { createReviewScope } from './review-scope.js';
import {
  READ_ONLY_ACTIONS,
  ReviewAction,
  describeAction,
  isPermitted,
  validateParticipants,
  PERMISSIONS
} from './permissions.js';

/**
 * Called once all approval guards pass; returns the version label under
 * which the approved snapshot was recorded. Throwing aborts the approval.
 */
export type ApprovalListener = (session: ReviewSession, approvedAt: Date) => string;

/**
 * Options for a session
 */
export interface ReviewSessionOptions {
  clock?: Clock;
  logger?: Logger;
  onApproved?: ApprovalListener;
}

/**
 * Fields needed to start a session
 */
export interface ReviewSessionInit {
  id: string;
  name: string;
  description: string;
  kind: ReviewKind;
  scope: ReviewScope;
  participants: readonly Participant[];
  dueDate: Date;
  baselineSnapshotVersion: string | null;
  /** Restored sessions keep their original creation time */
  createdAt?: Date;
}

export class ReviewSession {
  readonly id: string;
  readonly kind: ReviewKind;
  readonly scope: ReviewScope;
  readonly createdAt: Date;
  readonly comments: CommentLedger;

  private _name: string;
  private _description: string;
  private _participants: Participant[];
  private _dueDate: Date;
  private _baselineSnapshotVersion: string | null;
  private _approval: ApprovalRecord | null = null;
  private state: ReviewStatus = 'open';
  private readonly completed = new Set<string>();
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly onApproved?: ApprovalListener;

  constructor(init: ReviewSessionInit, options: ReviewSessionOptions = {}, comments: readonly Comment[] = []) {
    if (Number.isNaN(init.dueDate.getTime())) {
      throw new ValidationError('Due date is invalid', 'dueDate');
    }
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child('session');
    this.onApproved = options.onApproved;

    this.id = init.id;
    this._name = init.name;
    this._description = sanitizeText(init.description, 'description', MAX_LENGTHS.description);
    this.kind = init.kind;
    this.scope = createReviewScope(init.scope.entityIds, init.scope.requirementIds);
    this._participants = validateParticipants(init.kind, init.participants);
    this._dueDate = new Date(init.dueDate.getTime());
    this._baselineSnapshotVersion = init.baselineSnapshotVersion;
    this.createdAt = init.createdAt ? new Date(init.createdAt.getTime()) : this.clock();
    this.comments = new CommentLedger(this.scope, { clock: this.clock, comments });
  }

  /**
   * Rebuilds a session from persisted state
   */
  static fromRecord(record: ReviewSessionRecord, options: ReviewSessionOptions = {}): ReviewSession {
    const session = new ReviewSession(record, options, record.comments);
    session._approval = record.approval;
    session.state = record.status === 'approved' ? 'approved' : 'open';
    const reviewers = new Set(session.participantsWithRole('reviewer').map(p => p.name));
    for (const name of record.completedReviewers) {
      if (reviewers.has(name)) {
        session.completed.add(name);
      }
    }
    return session;
  }

  get name(): string {
    return this._name;
  }

  get description(): string {
    return this._description;
  }

  get dueDate(): Date {
    return new Date(this._dueDate.getTime());
  }

  get participants(): readonly Participant[] {
    return [...this._participants];
  }

  get baselineSnapshotVersion(): string | null {
    return this._baselineSnapshotVersion;
  }

  get approval(): ApprovalRecord | null {
    return this._approval;
  }

  /**
   * Current state; read-only is derived from the clock on every read
   */
  get status(): ReviewStatus {
    if (this.state !== 'approved') {
      this.state = this.clock().getTime() >= this._dueDate.getTime() ? 'read-only' : 'open';
    }
    return this.state;
  }

  participant(name: string): Participant | undefined {
    const key = name.trim().toLowerCase();
    return this._participants.find(p => p.name.toLowerCase() === key);
  }

  participantsWithRole(role: Participant['role']): Participant[] {
    return this._participants.filter(p => p.role === role);
  }

  /**
   * Resolves the acting participant and applies role and lock guards
   */
  private authorize(actor: string, action: ReviewAction): Participant {
    const participant = this.participant(actor);
    if (!participant) {
      this.deny(action, actor, 'not a participant of this review');
    }
    if (!isPermitted(participant.role, action)) {
      this.deny(action, actor, `requires role ${PERMISSIONS[action].join(' or ')}, has ${participant.role}`);
    }

    const status = this.status;
    if (status === 'approved' || (status === 'read-only' && !READ_ONLY_ACTIONS.has(action))) {
      this.log.debug('Rejected action on locked review', { review: this._name, action, actor, status });
      throw new ReviewLockedError(this._name, status, describeAction(action));
    }
    return participant;
  }

  private deny(action: ReviewAction, actor: string, reason: string): never {
    this.log.debug('Permission denied', { review: this._name, action, actor, reason });
    throw new PermissionDeniedError(describeAction(action), actor, reason);
  }

  addComment(actor: string, target: string, text: string, field?: string): Comment {
    const author = this.authorize(actor, 'comment');
    return this.comments.addComment(target, author, text, field);
  }

  /**
   * Only the moderator closes comments
   */
  resolveComment(actor: string, commentId: string, explanation: string): Comment {
    this.authorize(actor, 'resolve-comment');
    return this.comments.resolve(commentId, explanation);
  }

  reopenComment(actor: string, commentId: string, text: string): Comment {
    const author = this.authorize(actor, 'reopen-comment');
    return this.comments.reopen(commentId, author, text);
  }

  /**
   * Records that a reviewer finished; repeated calls have no effect
   */
  markReviewerComplete(actor: string): void {
    const reviewer = this.authorize(actor, 'mark-complete');
    this.completed.add(reviewer.name);
  }

  isReviewerComplete(name: string): boolean {
    const participant = this.participant(name);
    return participant !== undefined && this.completed.has(participant.name);
  }

  /**
   * Reviewers who have not marked themselves complete, in participant order
   */
  pendingReviewers(): string[] {
    return this.participantsWithRole('reviewer')
      .filter(p => !this.completed.has(p.name))
      .map(p => p.name);
  }

  /**
   * Open comments on targets inside the scope
   */
  unresolvedComments(): Comment[] {
    return this.comments.unresolved().filter(c => this.comments.isInScope(c.target));
  }

  /**
   * Approves a joint review
   *
   * @throws PermissionDeniedError for peer reviews and non-approvers
   * @throws ReviewLockedError while read-only or already approved
   * @throws ApprovalBlockedError while reviewers are pending or comments are open
   */
  approve(actor: string): ApprovalRecord {
    if (this.kind === 'peer') {
      this.deny('approve', actor, 'peer reviews have no approval step');
    }
    const approver = this.authorize(actor, 'approve');

    const pending = this.pendingReviewers();
    const unresolved = this.unresolvedComments().map(c => c.id);
    if (pending.length > 0 || unresolved.length > 0) {
      this.log.debug('Approval blocked', { review: this._name, pending, unresolved });
      throw new ApprovalBlockedError(pending, unresolved);
    }

    const approvedAt = this.clock();
    const version = this.onApproved ? this.onApproved(this, approvedAt) : null;
    this._approval = Object.freeze({ approvedBy: approver.name, approvedAt, version });
    this.state = 'approved';
    return this._approval;
  }

  /**
   * Moves the due date; the review reopens when the new date is in the future
   */
  extendDueDate(actor: string, newDate: Date): ReviewStatus {
    this.authorize(actor, 'extend-due-date');
    if (Number.isNaN(newDate.getTime())) {
      throw new ValidationError('Due date is invalid', 'dueDate');
    }
    this._dueDate = new Date(newDate.getTime());
    const status = this.status;
    this.log.info('Due date changed', { review: this._name, dueDate: newDate.toISOString(), status });
    return status;
  }

  updateDescription(actor: string, description: string): void {
    this.authorize(actor, 'edit-description');
    this._description = sanitizeText(description, 'description', MAX_LENGTHS.description);
  }

  /**
   * Replaces the participant list; completion flags of reviewers who stay are kept
   */
  setParticipants(actor: string, participants: readonly Participant[]): void {
    this.authorize(actor, 'edit-participants');
    const next = validateParticipants(this.kind, participants);
    const reviewers = new Set(next.filter(p => p.role === 'reviewer').map(p => p.name));
    for (const name of [...this.completed]) {
      if (!reviewers.has(name)) {
        this.completed.delete(name);
      }
    }
    this._participants = next;
  }

  /**
   * Records the approved version the session compares against
   */
  rebase(version: string | null): void {
    this._baselineSnapshotVersion = version;
  }

  toRecord(): ReviewSessionRecord {
    return {
      id: this.id,
      name: this._name,
      description: this._description,
      kind: this.kind,
      scope: createReviewScope(this.scope.entityIds, this.scope.requirementIds),
      participants: this._participants.map(p => ({ ...p })),
      dueDate: this.dueDate,
      status: this.status,
      baselineSnapshotVersion: this._baselineSnapshotVersion,
      completedReviewers: this.participantsWithRole('reviewer')
        .map(p => p.name)
        .filter(name => this.completed.has(name)),
      approval: this._approval,
      comments: [...this.comments.all()],
      createdAt: new Date(this.createdAt.getTime())
    };
  }
}
