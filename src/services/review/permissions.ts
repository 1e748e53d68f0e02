// Role permission table for review actions

import { Participant } from '../../models/review.js';
import { ReviewKind, Role } from '../../models/types.js';
import { InvalidParticipantsError } from '../../core/errors.js';
import { validateEmail, validateParticipantName } from '../../core/validation.js';

/**
 * Actions a participant can take on a review
 */
export type ReviewAction =
  | 'comment'
  | 'reopen-comment'
  | 'resolve-comment'
  | 'mark-complete'
  | 'approve'
  | 'extend-due-date'
  | 'edit-description'
  | 'edit-participants';

/**
 * Roles allowed to perform each action
 */
export const PERMISSIONS: Readonly<Record<ReviewAction, readonly Role[]>> = {
  'comment': ['moderator', 'reviewer', 'approver'],
  'reopen-comment': ['moderator', 'reviewer', 'approver'],
  'resolve-comment': ['moderator'],
  'mark-complete': ['reviewer'],
  'approve': ['approver'],
  'extend-due-date': ['moderator'],
  'edit-description': ['moderator'],
  'edit-participants': ['moderator']
};

/**
 * Actions still allowed once the due date has passed
 */
export const READ_ONLY_ACTIONS: ReadonlySet<ReviewAction> = new Set<ReviewAction>([
  'comment',
  'reopen-comment',
  'resolve-comment',
  'extend-due-date',
  'edit-description',
  'edit-participants'
]);

export function isPermitted(role: Role, action: ReviewAction): boolean {
  return PERMISSIONS[action].includes(role);
}

/**
 * Human-readable action name for messages
 */
export function describeAction(action: ReviewAction): string {
  return action.replace(/-/g, ' ');
}

/**
 * Normalizes participants and checks the role-count rules: both review
 * kinds need at least one moderator and one reviewer. Names are unique.
 *
 * @throws InvalidParticipantsError
 */
export function validateParticipants(kind: ReviewKind, participants: readonly Participant[]): Participant[] {
  const normalized = participants.map(p => ({
    name: validateParticipantName(p.name),
    email: validateEmail(p.email),
    role: p.role
  }));

  const seen = new Set<string>();
  for (const participant of normalized) {
    const key = participant.name.toLowerCase();
    if (seen.has(key)) {
      throw new InvalidParticipantsError(`Participant listed twice: ${participant.name}`, { kind });
    }
    seen.add(key);
  }

  const count = (role: Role) => normalized.filter(p => p.role === role).length;
  const missing: string[] = [];
  if (count('moderator') === 0) missing.push('moderator');
  if (count('reviewer') === 0) missing.push('reviewer');

  if (missing.length > 0) {
    throw new InvalidParticipantsError(
      `A ${kind} review needs at least one ${missing.join(' and one ')}`,
      { kind, missing }
    );
  }

  return normalized;
}
