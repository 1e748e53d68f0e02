// Domain-specific error types for the review engine

/**
 * Base error class for all review engine errors
 */
export abstract class ReviewError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;
  /** Guidance shown to the user next to the message */
  abstract readonly hint: string;
  /** Invariant breaches abort the operation instead of being reported */
  readonly fatal: boolean = false;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.hint,
      context: this.context
    };
  }
}

/**
 * The acting participant's role does not allow the action
 */
export class PermissionDeniedError extends ReviewError {
  readonly code = 'PERMISSION_DENIED';
  readonly exitCode = 3;
  readonly hint = 'Switch to a participant whose role allows this action.';

  constructor(action: string, actor: string, reason: string) {
    super(`${actor} may not ${action}: ${reason}`, { action, actor });
  }
}

/**
 * Approval preconditions are not met
 */
export class ApprovalBlockedError extends ReviewError {
  readonly code = 'APPROVAL_BLOCKED';
  readonly exitCode = 5;
  readonly hint = 'Wait until every reviewer is done and every comment in scope is resolved.';

  constructor(
    public readonly pendingReviewers: readonly string[],
    public readonly unresolvedComments: readonly string[]
  ) {
    const reasons: string[] = [];
    if (pendingReviewers.length > 0) {
      reasons.push(`reviewers not done: ${pendingReviewers.join(', ')}`);
    }
    if (unresolvedComments.length > 0) {
      reasons.push(`unresolved comments: ${unresolvedComments.join(', ')}`);
    }
    super(`Review cannot be approved (${reasons.join('; ')})`, {
      pendingReviewers,
      unresolvedComments
    });
  }
}

/**
 * The review is read-only (past its due date, or approved)
 */
export class ReviewLockedError extends ReviewError {
  readonly code = 'REVIEW_LOCKED';
  readonly exitCode = 6;
  readonly hint = 'Ask the moderator to extend the due date.';

  constructor(reviewName: string, status: string, action: string) {
    super(`Review "${reviewName}" is ${status}; cannot ${action}`, { reviewName, status, action });
  }
}

/**
 * Comment target is not part of the review scope
 */
export class OutOfScopeError extends ReviewError {
  readonly code = 'OUT_OF_SCOPE';
  readonly exitCode = 2;
  readonly hint = 'Select an element that belongs to the review scope.';

  constructor(target: string) {
    super(`Target is not in the review scope: ${target}`, { target });
  }
}

/**
 * Resolving a comment requires an explanation
 */
export class EmptyExplanationError extends ReviewError {
  readonly code = 'EMPTY_EXPLANATION';
  readonly exitCode = 2;
  readonly hint = 'Describe how the comment was addressed.';

  constructor(commentId: string) {
    super(`Resolution of ${commentId} needs an explanation`, { commentId });
  }
}

/**
 * Comment has already been resolved
 */
export class AlreadyResolvedError extends ReviewError {
  readonly code = 'ALREADY_RESOLVED';
  readonly exitCode = 2;
  readonly hint = 'Reopen the comment to continue the discussion.';

  constructor(commentId: string) {
    super(`Comment already resolved: ${commentId}`, { commentId });
  }
}

/**
 * Review name already taken in the registry
 */
export class DuplicateNameError extends ReviewError {
  readonly code = 'DUPLICATE_NAME';
  readonly exitCode = 2;
  readonly hint = 'Choose a review name that is not in use.';

  constructor(name: string) {
    super(`A review named "${name}" already exists`, { name });
  }
}

/**
 * Participant roles violate the review kind's requirements
 */
export class InvalidParticipantsError extends ReviewError {
  readonly code = 'INVALID_PARTICIPANTS';
  readonly exitCode = 2;
  readonly hint = 'Add at least one moderator and one reviewer.';
}

/**
 * Snapshot breaks the entity store invariants
 */
export class MalformedSnapshotError extends ReviewError {
  readonly code = 'MALFORMED_SNAPSHOT';
  readonly exitCode = 70;
  readonly hint = 'The model file is corrupt; reload it from a saved version.';
  override readonly fatal = true;

  constructor(version: string, public readonly problems: readonly string[]) {
    super(`Snapshot "${version}" is malformed: ${problems.join('; ')}`, { version, problems });
  }
}

/**
 * Not found errors
 */
export class NotFoundError extends ReviewError {
  readonly code = 'NOT_FOUND';
  readonly exitCode = 4;
  readonly hint = 'Check the identifier and try again.';

  constructor(resourceType: string, id: string) {
    super(`${resourceType} not found: ${id}`, { resourceType, id });
  }
}

/**
 * Validation errors for invalid input or persisted data
 */
export class ValidationError extends ReviewError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 2;
  readonly hint = 'Correct the highlighted value.';

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Storage/filesystem errors
 */
export class StorageError extends ReviewError {
  readonly code = 'STORAGE_ERROR';
  readonly exitCode = 1;
  readonly hint = 'Check that the review directory exists and is writable.';
}
