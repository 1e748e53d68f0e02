// YAML deserializer for review state and model snapshots

import * as yaml from 'yaml';
import { z } from 'zod';
import {
  ApprovedVersion,
  Comment,
  ReviewSessionRecord,
  ReviewState
} from '../../models/review.js';
import { Snapshot } from '../../models/snapshot.js';
import {
  ReviewStateSchema,
  SerializedComment,
  SerializedReviewSession,
  SerializedSnapshot,
  SnapshotSchema,
  describeIssues
} from '../../core/schemas.js';
import { ValidationError } from '../../core/errors.js';
import { createReviewScope } from '../review/review-scope.js';

type SerializedHistoryEntry = z.infer<typeof ReviewStateSchema>['history'][number];

/**
 * Parses YAML (JSON is a subset) and reports syntax errors with their line
 */
function parseDocument(input: string, what: string): unknown {
  try {
    return yaml.parse(input);
  } catch (error) {
    if (error instanceof yaml.YAMLParseError) {
      const line = error.linePos?.[0]?.line;
      throw new ValidationError(
        `Invalid ${what}: ${error.message.split('\n')[0] ?? error.message}`,
        undefined,
        line !== undefined ? { line } : undefined
      );
    }
    throw error;
  }
}

function validate<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = describeIssues(result.error);
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, undefined, { issues });
  }
  return result.data;
}

export function toSnapshot(data: SerializedSnapshot): Snapshot {
  return {
    version: data.version,
    entities: data.entities.map(e => ({ id: e.id, kind: e.kind, fields: { ...e.fields } })),
    links: data.links.map(l => ({ source: l.source, target: l.target, kind: l.kind })),
    allocations: data.allocations.map(a => ({ entityId: a.entityId, requirementId: a.requirementId }))
  };
}

function toComment(data: SerializedComment): Comment {
  return {
    id: data.id,
    author: { name: data.author.name, email: data.author.email, role: data.author.role },
    target: data.target,
    ...(data.field !== undefined ? { field: data.field } : {}),
    text: data.text,
    createdAt: data.createdAt,
    resolved: data.resolved,
    ...(data.resolution !== undefined ? { resolution: data.resolution } : {}),
    ...(data.resolvedAt !== undefined ? { resolvedAt: data.resolvedAt } : {}),
    ...(data.reopens !== undefined ? { reopens: data.reopens } : {})
  };
}

function toSessionRecord(data: SerializedReviewSession): ReviewSessionRecord {
  return {
    id: data.id,
    name: data.name,
    description: data.description,
    kind: data.kind,
    scope: createReviewScope(data.scope.entityIds, data.scope.requirementIds),
    participants: data.participants.map(p => ({ name: p.name, email: p.email, role: p.role })),
    dueDate: data.dueDate,
    status: data.status,
    baselineSnapshotVersion: data.baselineSnapshotVersion,
    completedReviewers: [...data.completedReviewers],
    approval: data.approval
      ? { approvedBy: data.approval.approvedBy, approvedAt: data.approval.approvedAt, version: data.approval.version }
      : null,
    comments: data.comments.map(toComment),
    createdAt: data.createdAt
  };
}

function toApprovedVersion(data: SerializedHistoryEntry): ApprovedVersion {
  return {
    snapshot: toSnapshot(data.snapshot),
    sessionId: data.sessionId,
    approvedAt: data.approvedAt,
    checksum: data.checksum
  };
}

/**
 * Deserializes registry state written by serializeReviewState
 *
 * @throws ValidationError if the document is malformed
 */
export function deserializeReviewState(input: string): ReviewState {
  const data = validate(ReviewStateSchema, parseDocument(input, 'review state'), 'review state');
  return {
    sessions: data.sessions.map(toSessionRecord),
    history: data.history.map(toApprovedVersion)
  };
}

/**
 * Deserializes a model snapshot (YAML or JSON). The structural checks only;
 * link and allocation invariants are checked by validateSnapshot.
 *
 * @param fallbackVersion - version label used when the file has none
 */
export function deserializeSnapshot(input: string, fallbackVersion?: string): Snapshot {
  const raw = parseDocument(input, 'snapshot');
  const withVersion = fallbackVersion !== undefined && isRecord(raw) && raw.version === undefined
    ? { ...raw, version: fallbackVersion }
    : raw;
  return toSnapshot(validate(SnapshotSchema, withVersion, 'snapshot'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
