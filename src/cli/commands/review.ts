// Review session commands for the safety review CLI

import { Command } from 'commander';
import * as path from 'path';
import { ReviewKindSchema, ReviewStatusSchema } from '../../core/schemas.js';
import { ValidationError } from '../../core/errors.js';
import { parseDate } from '../../core/validation.js';
import { ReviewScope } from '../../models/review.js';
import { ReviewStatus } from '../../models/types.js';
import { Snapshot } from '../../models/snapshot.js';
import { ReviewStore } from '../../services/storage/review-store.js';
import { ReviewRegistry } from '../../services/review/review-registry.js';
import { createReviewScope, expandScope } from '../../services/review/review-scope.js';
import { EntityStore } from '../../services/store/entity-store.js';
import {
  DEFAULT_MODEL_FILE,
  WorkspaceOptions,
  collect,
  openWorkspace,
  parseList,
  parseParticipant,
  reviewDir
} from '../utils/workspace.js';
import { formatChangeSet, formatComment, formatSession } from '../utils/format.js';
import { success, warn, withErrorHandling } from '../utils/error-handler.js';

interface CreateOptions extends WorkspaceOptions {
  name: string;
  kind: string;
  participant: string[];
  scope?: string;
  roots?: string;
  due?: string;
  description?: string;
}

interface ListOptions extends WorkspaceOptions {
  status?: string;
}

interface ActorOptions extends WorkspaceOptions {
  as: string;
}

interface CommentOptions extends ActorOptions {
  target: string;
  text: string;
  field?: string;
}

interface ResolveOptions extends ActorOptions {
  explanation: string;
}

interface ReopenOptions extends ActorOptions {
  text: string;
}

interface ExtendOptions extends ActorOptions {
  due: string;
}

interface MergeOptions extends WorkspaceOptions {
  fromPath: string;
  fromModel: string;
  fromReview: string;
}

/**
 * Adds the options every review subcommand takes
 */
function withWorkspace(command: Command): Command {
  return command
    .option('-m, --model <file>', 'Working model snapshot file', DEFAULT_MODEL_FILE)
    .option('-p, --path <path>', 'Base path', process.cwd());
}

function buildScope(snapshot: Snapshot, options: CreateOptions): ReviewScope {
  const roots = parseList(options.roots);
  const ids = parseList(options.scope);
  if (roots.length === 0 && ids.length === 0) {
    throw new ValidationError('Give --scope or --roots', 'scope');
  }
  const expanded = expandScope(snapshot, roots);
  const requirements = new Set(expanded.requirementIds);
  for (const allocation of snapshot.allocations) {
    if (ids.includes(allocation.entityId)) {
      requirements.add(allocation.requirementId);
    }
  }
  return createReviewScope([...expanded.entityIds, ...ids], requirements);
}

export function registerReviewCommands(program: Command): void {
  const review = program
    .command('review')
    .description('Manage peer and joint reviews');

  // Create review
  withWorkspace(
    review
      .command('create')
      .description('Start a peer or joint review')
      .requiredOption('-n, --name <name>', 'Review name')
      .option('-k, --kind <kind>', 'Review kind (peer or joint)', 'peer')
      .option('--participant <name:email:role>', 'Participant (repeatable)', collect, [])
      .option('-s, --scope <ids>', 'Comma-separated entity identifiers')
      .option('-r, --roots <ids>', 'Fault tree / FMEA roots; includes everything below them')
      .option('--due <date>', 'Due date (ISO); defaults to the configured duration')
      .option('-d, --description <text>', 'Review description')
  ).action(withErrorHandling(async (options: CreateOptions) => {
    const kind = ReviewKindSchema.safeParse(options.kind);
    if (!kind.success) {
      throw new ValidationError(`Unknown review kind "${options.kind}" (peer or joint)`, 'kind');
    }
    const workspace = await openWorkspace(options);
    const session = workspace.registry.createSession({
      kind: kind.data,
      name: options.name,
      description: options.description,
      scope: buildScope(workspace.model.currentSnapshot(), options),
      participants: options.participant.map(parseParticipant),
      dueDate: options.due ? parseDate(options.due, 'due') : undefined
    });
    await workspace.save();

    success(`Created review: ${session.id}`);
    for (const line of formatSession(session)) {
      console.log(line);
    }
    if (session.kind === 'joint' && session.participantsWithRole('approver').length === 0) {
      warn('This joint review has no approver; it cannot be approved until one is added');
    }
  }));

  // List reviews
  withWorkspace(
    review
      .command('list')
      .description('List reviews')
      .option('-s, --status <status>', 'Filter by status (open, read-only, approved)')
  ).action(withErrorHandling(async (options: ListOptions) => {
    let status: ReviewStatus | undefined;
    if (options.status !== undefined) {
      const parsed = ReviewStatusSchema.safeParse(options.status);
      if (!parsed.success) {
        throw new ValidationError(`Unknown status "${options.status}"`, 'status');
      }
      status = parsed.data;
    }
    const { registry } = await openWorkspace(options);
    const sessions = registry.list({ status });
    if (sessions.length === 0) {
      console.log('No reviews found');
      return;
    }
    console.log(`Found ${sessions.length} review(s):\n`);
    for (const s of sessions) {
      console.log(`  ${s.id} - ${s.name}`);
      console.log(`    Kind: ${s.kind} | Status: ${s.status} | Open comments: ${s.unresolvedComments().length}`);
    }
  }));

  // Show review
  withWorkspace(
    review
      .command('show <review>')
      .description('Show review details and comments')
  ).action(withErrorHandling(async (id: string, options: WorkspaceOptions) => {
    const { registry } = await openWorkspace(options);
    const session = registry.requireSession(id);
    for (const line of formatSession(session)) {
      console.log(line);
    }
    const pending = session.pendingReviewers();
    if (pending.length > 0) {
      console.log(`  Pending reviewers: ${pending.join(', ')}`);
    }
    const comments = session.comments.all();
    console.log(`\nComments (${comments.length}):`);
    for (const comment of comments) {
      for (const line of formatComment(comment)) {
        console.log(`  ${line}`);
      }
    }
  }));

  // Open review: changes since the last approved version
  withWorkspace(
    review
      .command('open <review>')
      .description('Show what changed in the review scope since the last approved version')
  ).action(withErrorHandling(async (id: string, options: WorkspaceOptions) => {
    const workspace = await openWorkspace(options);
    const changeSet = workspace.registry.openSession(id);
    await workspace.save();
    for (const line of formatChangeSet(changeSet)) {
      console.log(line);
    }
    const unresolved = workspace.registry.requireSession(id).comments.unresolvedTargets();
    if (unresolved.size > 0) {
      console.log(`\nOpen comments on: ${[...unresolved].join(', ')}`);
    }
  }));

  // Comment
  withWorkspace(
    review
      .command('comment <review>')
      .description('Comment on an entity or requirement in scope')
      .requiredOption('--as <participant>', 'Acting participant')
      .requiredOption('-t, --target <id>', 'Entity or requirement identifier')
      .requiredOption('--text <text>', 'Comment text')
      .option('-f, --field <field>', 'Field of the target, e.g. an FMEA column')
  ).action(withErrorHandling(async (id: string, options: CommentOptions) => {
    const workspace = await openWorkspace(options);
    const comment = workspace.registry
      .requireSession(id)
      .addComment(options.as, options.target, options.text, options.field);
    await workspace.save();
    success(`Added comment ${comment.id}`);
  }));

  // Resolve
  withWorkspace(
    review
      .command('resolve <review> <comment>')
      .description('Resolve a comment (moderator)')
      .requiredOption('--as <participant>', 'Acting participant')
      .requiredOption('-e, --explanation <text>', 'How the comment was addressed')
  ).action(withErrorHandling(async (id: string, commentId: string, options: ResolveOptions) => {
    const workspace = await openWorkspace(options);
    workspace.registry.requireSession(id).resolveComment(options.as, commentId, options.explanation);
    await workspace.save();
    success(`Resolved ${commentId}`);
  }));

  // Reopen
  withWorkspace(
    review
      .command('reopen <review> <comment>')
      .description('Continue the discussion on a resolved comment')
      .requiredOption('--as <participant>', 'Acting participant')
      .requiredOption('--text <text>', 'Comment text')
  ).action(withErrorHandling(async (id: string, commentId: string, options: ReopenOptions) => {
    const workspace = await openWorkspace(options);
    const comment = workspace.registry.requireSession(id).reopenComment(options.as, commentId, options.text);
    await workspace.save();
    success(`Added comment ${comment.id} reopening ${commentId}`);
  }));

  // Reviewer done
  withWorkspace(
    review
      .command('done <review>')
      .description('Mark the acting reviewer as finished')
      .requiredOption('--as <participant>', 'Acting participant')
  ).action(withErrorHandling(async (id: string, options: ActorOptions) => {
    const workspace = await openWorkspace(options);
    const session = workspace.registry.requireSession(id);
    session.markReviewerComplete(options.as);
    await workspace.save();
    const pending = session.pendingReviewers();
    success(pending.length > 0 ? `Still waiting for: ${pending.join(', ')}` : 'All reviewers are done');
  }));

  // Approve
  withWorkspace(
    review
      .command('approve <review>')
      .description('Approve a joint review (approver)')
      .requiredOption('--as <participant>', 'Acting participant')
  ).action(withErrorHandling(async (id: string, options: ActorOptions) => {
    const workspace = await openWorkspace(options);
    const approval = workspace.registry.requireSession(id).approve(options.as);
    await workspace.save();
    success(`Approved${approval.version ? ` as ${approval.version}` : ''}`);
  }));

  // Extend
  withWorkspace(
    review
      .command('extend <review>')
      .description('Change the due date (moderator)')
      .requiredOption('--as <participant>', 'Acting participant')
      .requiredOption('--due <date>', 'New due date (ISO)')
  ).action(withErrorHandling(async (id: string, options: ExtendOptions) => {
    const workspace = await openWorkspace(options);
    const status = workspace.registry.requireSession(id).extendDueDate(options.as, parseDate(options.due, 'due'));
    await workspace.save();
    success(`Due date set to ${options.due}; review is ${status}`);
  }));

  // Merge comments from another model's review
  withWorkspace(
    review
      .command('merge <review>')
      .description("Copy comments from another model's review")
      .requiredOption('--from-path <path>', 'Base path of the other model')
      .requiredOption('--from-review <review>', 'Review in the other model')
      .option('--from-model <file>', 'Snapshot file of the other model', DEFAULT_MODEL_FILE)
  ).action(withErrorHandling(async (id: string, options: MergeOptions) => {
    const workspace = await openWorkspace(options);
    const target = workspace.registry.requireSession(id);

    const otherStore = new ReviewStore({ baseDir: reviewDir(options.fromPath) });
    const otherSnapshot = await otherStore.loadSnapshot(path.resolve(options.fromPath, options.fromModel));
    const otherState = await otherStore.loadState();
    if (!otherState) {
      throw new ValidationError(`No reviews stored under ${options.fromPath}`, 'from-path');
    }
    const other = ReviewRegistry.fromState(otherState, { source: EntityStore.fromSnapshot(otherSnapshot) });
    const source = other.requireSession(options.fromReview);

    const merged = workspace.registry.mergeComments(otherSnapshot, source.comments, target);
    await workspace.save();
    success(`Merged ${merged} comment(s) into ${target.id}`);
  }));

  // Export bundle
  withWorkspace(
    review
      .command('export <review>')
      .description('Print session, comments and change-set as JSON')
  ).action(withErrorHandling(async (id: string, options: WorkspaceOptions) => {
    const { registry } = await openWorkspace(options);
    const bundle = registry.exportBundle(id);
    console.log(JSON.stringify(
      {
        ...bundle,
        session: {
          ...bundle.session,
          scope: {
            entityIds: [...bundle.session.scope.entityIds],
            requirementIds: [...bundle.session.scope.requirementIds]
          }
        }
      },
      null,
      2
    ));
  }));
}
