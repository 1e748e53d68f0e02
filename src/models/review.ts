// Review workflow data model

import { ReviewKind, ReviewStatus, Role } from './types.js';
import { Snapshot } from './snapshot.js';

/**
 * Person taking part in a review
 */
export interface Participant {
  readonly name: string;
  readonly email: string;
  readonly role: Role;
}

/**
 * Entities and requirements frozen at review creation
 */
export interface ReviewScope {
  readonly entityIds: ReadonlySet<string>;
  /** Requirements allocated to scoped entities */
  readonly requirementIds: ReadonlySet<string>;
}

/**
 * Review comment. Records are never edited after resolution; reopening
 * appends a new comment pointing back through `reopens`.
 */
export interface Comment {
  readonly id: string;
  readonly author: Participant;
  /** Entity or requirement identifier */
  readonly target: string;
  /** Column of the target, e.g. an FMEA field */
  readonly field?: string;
  readonly text: string;
  readonly createdAt: Date;
  readonly resolved: boolean;
  /** Present iff resolved */
  readonly resolution?: string;
  readonly resolvedAt?: Date;
  readonly reopens?: string;
}

/**
 * Approval record of a joint review
 */
export interface ApprovalRecord {
  readonly approvedBy: string;
  readonly approvedAt: Date;
  /** Version label assigned to the approved snapshot, null when none was recorded */
  readonly version: string | null;
}

/**
 * Persistable state of one review session
 */
export interface ReviewSessionRecord {
  id: string;
  name: string;
  description: string;
  kind: ReviewKind;
  scope: ReviewScope;
  participants: Participant[];
  dueDate: Date;
  status: ReviewStatus;
  /** Approved version the session was opened against, null before any approval */
  baselineSnapshotVersion: string | null;
  /** Reviewers who called markReviewerComplete */
  completedReviewers: string[];
  approval: ApprovalRecord | null;
  comments: Comment[];
  createdAt: Date;
}

/**
 * Entry of the approved-version history
 */
export interface ApprovedVersion {
  readonly snapshot: Snapshot;
  readonly sessionId: string;
  readonly approvedAt: Date;
  /** SHA-256 of the snapshot's canonical form */
  readonly checksum: string;
}

/**
 * Everything the registry persists
 */
export interface ReviewState {
  sessions: ReviewSessionRecord[];
  history: ApprovedVersion[];
}
