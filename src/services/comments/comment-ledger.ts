/**
 * Comment Ledger
 *
 * Ordered comment threads per review target with resolution state.
 * Comments are append-only: resolving records the explanation once, and
 * reopening adds a new comment instead of editing the resolved one.
 */

import { Comment, Participant, ReviewScope } from '../../models/review.js';
import { Clock, systemClock } from '../../models/types.js';
import {
  AlreadyResolvedError,
  EmptyExplanationError,
  NotFoundError,
  OutOfScopeError,
  ValidationError
} from '../../core/errors.js';
import { MAX_LENGTHS, isBlank, sanitizeText, validateIdentifier } from '../../core/validation.js';
import { IdGenerator } from '../id-generator.js';

/**
 * Options for a ledger
 */
export interface CommentLedgerOptions {
  clock?: Clock;
  /** Comments restored from persisted state, in insertion order */
  comments?: readonly Comment[];
}

/**
 * Key identifying duplicate comments during merges
 */
function duplicateKey(target: string, author: string, text: string): string {
  return [target, author, text].join('\u0000');
}

export class CommentLedger {
  private readonly comments: Comment[] = [];
  private readonly positions = new Map<string, number>();
  private readonly ids: IdGenerator;
  private readonly clock: Clock;

  constructor(private readonly scope: ReviewScope, options: CommentLedgerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.ids = new IdGenerator('comment');
    for (const comment of options.comments ?? []) {
      this.append(comment);
    }
  }

  private append(comment: Comment): Comment {
    const frozen = Object.freeze({ ...comment, author: Object.freeze({ ...comment.author }) });
    this.positions.set(frozen.id, this.comments.length);
    this.comments.push(frozen);
    this.ids.observe(frozen.id);
    return frozen;
  }

  private position(commentId: string): number {
    const index = this.positions.get(commentId);
    if (index === undefined) {
      throw new NotFoundError('Comment', commentId);
    }
    return index;
  }

  private requireText(text: string): string {
    const cleaned = sanitizeText(text, 'text', MAX_LENGTHS.comment);
    if (isBlank(cleaned)) {
      throw new ValidationError('Comment text cannot be empty', 'text');
    }
    return cleaned;
  }

  /**
   * True when comments may target this identifier
   */
  isInScope(target: string): boolean {
    return this.scope.entityIds.has(target) || this.scope.requirementIds.has(target);
  }

  /**
   * Adds a comment on an entity or requirement in scope
   *
   * @throws OutOfScopeError when the target is outside the review scope
   */
  addComment(target: string, author: Participant, text: string, field?: string): Comment {
    const id = validateIdentifier(target, 'target');
    if (!this.isInScope(id)) {
      throw new OutOfScopeError(id);
    }
    const body = this.requireText(text);
    const column = field === undefined || isBlank(field) ? undefined : field.trim();

    return this.append({
      id: this.ids.next(),
      author,
      target: id,
      ...(column !== undefined ? { field: column } : {}),
      text: body,
      createdAt: this.clock(),
      resolved: false
    });
  }

  /**
   * Resolves a comment with an explanation
   *
   * @throws AlreadyResolvedError on a second resolution
   * @throws EmptyExplanationError when the explanation is blank
   */
  resolve(commentId: string, explanation: string): Comment {
    const index = this.position(commentId);
    const current = this.comments[index];
    if (!current) {
      throw new NotFoundError('Comment', commentId);
    }
    if (current.resolved) {
      throw new AlreadyResolvedError(commentId);
    }
    const resolution = sanitizeText(explanation, 'explanation', MAX_LENGTHS.comment).trim();
    if (isBlank(resolution)) {
      throw new EmptyExplanationError(commentId);
    }

    const resolved: Comment = Object.freeze({
      ...current,
      resolved: true,
      resolution,
      resolvedAt: this.clock()
    });
    this.comments[index] = resolved;
    return resolved;
  }

  /**
   * Continues the discussion on a resolved comment by appending a new one
   */
  reopen(commentId: string, author: Participant, text: string): Comment {
    const original = this.get(commentId);
    if (!original) {
      throw new NotFoundError('Comment', commentId);
    }
    if (!original.resolved) {
      throw new ValidationError(`Comment ${commentId} is still open`, 'commentId');
    }
    const reopened = this.addComment(original.target, author, text, original.field);
    const linked: Comment = Object.freeze({ ...reopened, reopens: original.id });
    this.comments[this.position(reopened.id)] = linked;
    return linked;
  }

  /**
   * Copies a comment from another ledger under a new ID, keeping its
   * author, timestamps and resolution
   */
  importComment(comment: Comment): Comment {
    if (!this.isInScope(comment.target)) {
      throw new OutOfScopeError(comment.target);
    }
    const { reopens: _reopens, ...rest } = comment;
    return this.append({ ...rest, id: this.ids.next() });
  }

  /**
   * True when a comment with the same target, author and text exists; the
   * field is not part of the comparison
   */
  hasDuplicate(comment: Pick<Comment, 'target' | 'author' | 'text'>): boolean {
    const key = duplicateKey(comment.target, comment.author.name, comment.text);
    return this.comments.some(c => duplicateKey(c.target, c.author.name, c.text) === key);
  }

  get(commentId: string): Comment | undefined {
    const index = this.positions.get(commentId);
    return index === undefined ? undefined : this.comments[index];
  }

  /**
   * Comments on a target, in insertion order
   */
  commentsFor(target: string): Comment[] {
    return this.comments.filter(c => c.target === target);
  }

  all(): readonly Comment[] {
    return [...this.comments];
  }

  unresolved(): Comment[] {
    return this.comments.filter(c => !c.resolved);
  }

  /**
   * Targets with at least one open comment (drives the unresolved indicator)
   */
  unresolvedTargets(): Set<string> {
    return new Set(this.unresolved().map(c => c.target));
  }

  get size(): number {
    return this.comments.length;
  }
}
