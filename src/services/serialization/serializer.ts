// YAML serializer for review state and model snapshots

import * as yaml from 'yaml';
import {
  ApprovedVersion,
  Comment,
  ReviewSessionRecord,
  ReviewState
} from '../../models/review.js';
import { Snapshot } from '../../models/snapshot.js';

/**
 * Version of the persisted layout
 */
export const FORMAT_VERSION = 1;

const STRINGIFY_OPTIONS: yaml.ToStringOptions = {
  lineWidth: 0
};

/**
 * Plain-data form of a snapshot
 */
export function snapshotToData(snapshot: Snapshot): Record<string, unknown> {
  return {
    version: snapshot.version,
    entities: snapshot.entities.map(entity => ({
      id: entity.id,
      kind: entity.kind,
      fields: { ...entity.fields }
    })),
    links: snapshot.links.map(link => ({ source: link.source, target: link.target, kind: link.kind })),
    allocations: snapshot.allocations.map(a => ({ entityId: a.entityId, requirementId: a.requirementId }))
  };
}

function commentToData(comment: Comment): Record<string, unknown> {
  const data: Record<string, unknown> = {
    id: comment.id,
    author: { ...comment.author },
    target: comment.target
  };
  if (comment.field !== undefined) data.field = comment.field;
  data.text = comment.text;
  data.createdAt = comment.createdAt.toISOString();
  data.resolved = comment.resolved;
  if (comment.resolution !== undefined) data.resolution = comment.resolution;
  if (comment.resolvedAt !== undefined) data.resolvedAt = comment.resolvedAt.toISOString();
  if (comment.reopens !== undefined) data.reopens = comment.reopens;
  return data;
}

function sessionToData(session: ReviewSessionRecord): Record<string, unknown> {
  return {
    id: session.id,
    name: session.name,
    description: session.description,
    kind: session.kind,
    scope: {
      entityIds: [...session.scope.entityIds],
      requirementIds: [...session.scope.requirementIds]
    },
    participants: session.participants.map(p => ({ name: p.name, email: p.email, role: p.role })),
    dueDate: session.dueDate.toISOString(),
    status: session.status,
    baselineSnapshotVersion: session.baselineSnapshotVersion,
    completedReviewers: [...session.completedReviewers],
    approval: session.approval
      ? {
          approvedBy: session.approval.approvedBy,
          approvedAt: session.approval.approvedAt.toISOString(),
          version: session.approval.version
        }
      : null,
    comments: session.comments.map(commentToData),
    createdAt: session.createdAt.toISOString()
  };
}

function historyToData(entry: ApprovedVersion): Record<string, unknown> {
  return {
    sessionId: entry.sessionId,
    approvedAt: entry.approvedAt.toISOString(),
    checksum: entry.checksum,
    snapshot: snapshotToData(entry.snapshot)
  };
}

/**
 * Serializes the registry state to a YAML document
 */
export function serializeReviewState(state: ReviewState): string {
  const document = {
    formatVersion: FORMAT_VERSION,
    sessions: state.sessions.map(sessionToData),
    history: state.history.map(historyToData)
  };
  return yaml.stringify(document, STRINGIFY_OPTIONS);
}

/**
 * Serializes a model snapshot to YAML
 */
export function serializeSnapshot(snapshot: Snapshot): string {
  return yaml.stringify(snapshotToData(snapshot), STRINGIFY_OPTIONS);
}
