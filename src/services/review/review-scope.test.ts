// Tests for scope construction and the permission table

import { describe, it, expect } from 'vitest';
import { expandScope, scopeTargets } from './review-scope.js';
import { isPermitted, describeAction, READ_ONLY_ACTIONS } from './permissions.js';
import { Snapshot } from '../../models/snapshot.js';
import { NotFoundError } from '../../core/errors.js';

const model: Snapshot = {
  version: 'working',
  entities: [
    { id: 'TOP', kind: 'node', fields: {} },
    { id: 'G1', kind: 'node', fields: {} },
    { id: 'E1', kind: 'node', fields: {} },
    { id: 'OTHER', kind: 'node', fields: {} },
    { id: 'R1', kind: 'requirement', fields: {} },
    { id: 'R2', kind: 'requirement', fields: {} }
  ],
  links: [
    { source: 'TOP', target: 'G1', kind: 'parent-child' },
    { source: 'G1', target: 'E1', kind: 'parent-child' },
    { source: 'E1', target: 'G1', kind: 'parent-child' },
    { source: 'E1', target: 'OTHER', kind: 'connector' }
  ],
  allocations: [
    { entityId: 'E1', requirementId: 'R1' },
    { entityId: 'OTHER', requirementId: 'R2' }
  ]
};

describe('expandScope', () => {
  it('should follow parent-child links through cycles and collect allocated requirements', () => {
    const scope = expandScope(model, ['TOP']);
    expect([...scope.entityIds]).toEqual(['TOP', 'G1', 'E1']);
    expect([...scope.requirementIds]).toEqual(['R1']);
    expect(scopeTargets(scope)).toEqual(new Set(['TOP', 'G1', 'E1', 'R1']));
  });

  it('should reject unknown roots', () => {
    expect(() => expandScope(model, ['NOPE'])).toThrow(NotFoundError);
  });
});

describe('permissions', () => {
  it('should give each role its actions', () => {
    expect(isPermitted('moderator', 'resolve-comment')).toBe(true);
    expect(isPermitted('reviewer', 'resolve-comment')).toBe(false);
    expect(isPermitted('approver', 'approve')).toBe(true);
    expect(isPermitted('moderator', 'approve')).toBe(false);
  });

  it('should keep reviewer completion and approval out of the read-only window', () => {
    expect(READ_ONLY_ACTIONS.has('comment')).toBe(true);
    expect(READ_ONLY_ACTIONS.has('mark-complete')).toBe(false);
    expect(READ_ONLY_ACTIONS.has('approve')).toBe(false);
  });

  it('should describe actions in words', () => {
    expect(describeAction('extend-due-date')).toBe('extend due date');
  });
});
