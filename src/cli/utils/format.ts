// Plain-text rendering of change-sets, comments and sessions for the CLI

import { ChangeRecord, ChangeSet } from '../../models/change-set.js';
import { Comment } from '../../models/review.js';
import { formatTextDiff } from '../../services/diff/text-diff.js';
import { summarizeChangeSet } from '../../services/diff/diff-service.js';
import { ReviewSession } from '../../services/review/review-session.js';

/**
 * One line per change record; modified entities add one indented line per field
 */
export function formatChange(change: ChangeRecord): string[] {
  switch (change.type) {
    case 'entity-added':
      return [`+ ${change.entity.kind} ${change.entity.id}`];
    case 'entity-removed':
      return [`- ${change.entity.kind} ${change.entity.id}`];
    case 'entity-modified': {
      const kind = change.previousKind ? `${change.previousKind} -> ${change.kind}` : change.kind;
      return [
        `~ ${kind} ${change.entityId}`,
        ...change.fields.map(f => `    ${f.field}: ${formatTextDiff(f.text)}`)
      ];
    }
    case 'link-added':
      return [`+ link ${change.link.source} -> ${change.link.target} (${change.link.kind})`];
    case 'link-removed':
      return [`- link ${change.link.source} -> ${change.link.target} (${change.link.kind})`];
    case 'allocation-added':
      return [`+ allocation ${change.allocation.requirementId} -> ${change.allocation.entityId}`];
    case 'allocation-removed':
      return [`- allocation ${change.allocation.requirementId} -> ${change.allocation.entityId}`];
  }
}

export function formatChangeSet(changeSet: ChangeSet): string[] {
  const header = `Changes ${changeSet.fromVersion} -> ${changeSet.toVersion}`;
  if (changeSet.changes.length === 0) {
    return [header, '  (no changes)'];
  }
  const summary = summarizeChangeSet(changeSet);
  return [
    header,
    ...changeSet.changes.flatMap(formatChange).map(line => `  ${line}`),
    '',
    `${summary.total} change(s): ${summary['entity-added']} added, ` +
      `${summary['entity-removed']} removed, ${summary['entity-modified']} modified`
  ];
}

export function formatComment(comment: Comment): string[] {
  const target = comment.field ? `${comment.target}.${comment.field}` : comment.target;
  const state = comment.resolved ? 'resolved' : 'open';
  const lines = [
    `${comment.id} [${state}] ${target} - ${comment.author.name} (${comment.author.role})`,
    `    ${comment.text}`
  ];
  if (comment.reopens) {
    lines.push(`    reopens ${comment.reopens}`);
  }
  if (comment.resolution !== undefined) {
    lines.push(`    resolution: ${comment.resolution}`);
  }
  return lines;
}

export function formatSession(session: ReviewSession): string[] {
  const lines = [
    `${session.id} - ${session.name}`,
    `  Kind: ${session.kind} | Status: ${session.status} | Due: ${session.dueDate.toISOString()}`,
    `  Baseline: ${session.baselineSnapshotVersion ?? '(none)'}`,
    `  Scope: ${[...session.scope.entityIds].join(', ')}`
  ];
  if (session.description) {
    lines.push(`  Description: ${session.description}`);
  }
  for (const p of session.participants) {
    const done = p.role === 'reviewer' && session.isReviewerComplete(p.name) ? ' (done)' : '';
    lines.push(`  ${p.role}: ${p.name}${p.email ? ` <${p.email}>` : ''}${done}`);
  }
  if (session.approval) {
    lines.push(
      `  Approved by ${session.approval.approvedBy} at ${session.approval.approvedAt.toISOString()}` +
        (session.approval.version ? ` as ${session.approval.version}` : '')
    );
  }
  return lines;
}
