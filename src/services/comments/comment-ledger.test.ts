// Tests for the comment ledger

import { describe, it, expect, beforeEach } from 'vitest';
import { CommentLedger } from './comment-ledger.js';
import { createReviewScope } from '../review/review-scope.js';
import { Participant } from '../../models/review.js';
import {
  AlreadyResolvedError,
  EmptyExplanationError,
  NotFoundError,
  OutOfScopeError,
  ValidationError
} from '../../core/errors.js';

const alice: Participant = { name: 'Alice', email: '', role: 'reviewer' };
const mia: Participant = { name: 'Mia', email: 'mia@example.com', role: 'moderator' };

describe('CommentLedger', () => {
  let now: Date;
  let ledger: CommentLedger;

  beforeEach(() => {
    now = new Date('2025-03-01T09:00:00.000Z');
    ledger = new CommentLedger(createReviewScope(['N1', 'N2'], ['R1']), { clock: () => now });
  });

  describe('addComment', () => {
    it('should issue sequential ids and keep insertion order per target', () => {
      const first = ledger.addComment('N1', alice, 'Failure rate looks low');
      const second = ledger.addComment('N2', mia, 'Missing cause');
      const third = ledger.addComment('N1', mia, 'Agreed');

      expect([first.id, second.id, third.id]).toEqual(['C-0001', 'C-0002', 'C-0003']);
      expect(ledger.commentsFor('N1').map(c => c.id)).toEqual(['C-0001', 'C-0003']);
      expect(first.createdAt).toEqual(now);
      expect(first.resolved).toBe(false);
    });

    it('should accept requirement targets and field names', () => {
      const comment = ledger.addComment('R1', alice, 'Ambiguous', ' severity ');
      expect(comment.field).toBe('severity');
    });

    it('should reject targets outside the scope', () => {
      expect(() => ledger.addComment('N9', alice, 'x')).toThrow(OutOfScopeError);
    });

    it('should reject blank text', () => {
      expect(() => ledger.addComment('N1', alice, '  ')).toThrow(ValidationError);
    });

    it('should return frozen comments', () => {
      expect(Object.isFrozen(ledger.addComment('N1', alice, 'x'))).toBe(true);
    });
  });

  describe('resolve', () => {
    it('should record the trimmed explanation and time', () => {
      const comment = ledger.addComment('N1', alice, 'Check FIT');
      now = new Date('2025-03-02T09:00:00.000Z');

      const resolved = ledger.resolve(comment.id, '  Updated from field data ');
      expect(resolved.resolved).toBe(true);
      expect(resolved.resolution).toBe('Updated from field data');
      expect(resolved.resolvedAt).toEqual(new Date('2025-03-02T09:00:00.000Z'));
      expect(ledger.get(comment.id)).toEqual(resolved);
    });

    it('should fail on a second resolution', () => {
      const comment = ledger.addComment('N1', alice, 'Check FIT');
      ledger.resolve(comment.id, 'done');
      expect(() => ledger.resolve(comment.id, 'again')).toThrow(AlreadyResolvedError);
    });

    it('should fail on a blank explanation and leave the comment open', () => {
      const comment = ledger.addComment('N1', alice, 'Check FIT');
      expect(() => ledger.resolve(comment.id, ' \n')).toThrow(EmptyExplanationError);
      expect(ledger.get(comment.id)?.resolved).toBe(false);
    });

    it('should treat an explanation of control characters as blank', () => {
      const comment = ledger.addComment('N1', alice, 'Check FIT');
      expect(() => ledger.resolve(comment.id, '\u0001\u0002')).toThrow(EmptyExplanationError);
      expect(ledger.get(comment.id)?.resolved).toBe(false);
      expect(ledger.resolve(comment.id, '\u0001 done ').resolution).toBe('done');
    });

    it('should fail for unknown comments', () => {
      expect(() => ledger.resolve('C-0099', 'x')).toThrow(NotFoundError);
    });
  });

  describe('reopen', () => {
    it('should append a linked comment and leave the resolved one unchanged', () => {
      const original = ledger.addComment('N1', alice, 'Check FIT', 'fit');
      const resolved = ledger.resolve(original.id, 'done');

      const reopened = ledger.reopen(original.id, alice, 'Still wrong');

      expect(reopened).toMatchObject({ id: 'C-0002', target: 'N1', field: 'fit', reopens: 'C-0001', resolved: false });
      expect(ledger.get(original.id)).toEqual(resolved);
      expect(ledger.commentsFor('N1').map(c => c.id)).toEqual(['C-0001', 'C-0002']);
    });

    it('should refuse to reopen an open comment', () => {
      const original = ledger.addComment('N1', alice, 'Check FIT');
      expect(() => ledger.reopen(original.id, alice, 'again')).toThrow('Comment C-0001 is still open');
    });
  });

  describe('unresolvedTargets', () => {
    it('should list targets with at least one open comment', () => {
      const a = ledger.addComment('N1', alice, 'one');
      ledger.addComment('N2', alice, 'two');
      ledger.addComment('R1', alice, 'three');
      ledger.resolve(a.id, 'fixed');

      expect(ledger.unresolvedTargets()).toEqual(new Set(['N2', 'R1']));
      expect(ledger.unresolved().map(c => c.id)).toEqual(['C-0002', 'C-0003']);
    });
  });

  describe('restoring and importing', () => {
    it('should continue numbering after restored comments', () => {
      const first = ledger.addComment('N1', alice, 'one');
      const restored = new CommentLedger(createReviewScope(['N1']), { comments: [first] });
      expect(restored.addComment('N1', alice, 'two').id).toBe('C-0002');
    });

    it('should import under a new id and keep resolution state', () => {
      const other = new CommentLedger(createReviewScope(['N1']), { clock: () => now });
      const source = other.addComment('N1', mia, 'imported');
      const done = other.resolve(source.id, 'ok');

      ledger.addComment('N2', alice, 'existing');
      const imported = ledger.importComment(done);

      expect(imported.id).toBe('C-0002');
      expect(imported.resolved).toBe(true);
      expect(imported.resolution).toBe('ok');
      expect(ledger.hasDuplicate(done)).toBe(true);
    });

    it('should compare target, author and text but not the field', () => {
      ledger.addComment('N1', alice, 'same');
      const onColumn = { target: 'N1', author: alice, text: 'same', field: 'description' };
      expect(ledger.hasDuplicate(onColumn)).toBe(true);
      expect(ledger.hasDuplicate({ target: 'N2', author: alice, text: 'same' })).toBe(false);
      expect(ledger.hasDuplicate({ target: 'N1', author: mia, text: 'same' })).toBe(false);
    });

    it('should refuse imports outside the scope', () => {
      const other = new CommentLedger(createReviewScope(['N7']));
      const source = other.addComment('N7', mia, 'elsewhere');
      expect(() => ledger.importComment(source)).toThrow(OutOfScopeError);
    });
  });
});
