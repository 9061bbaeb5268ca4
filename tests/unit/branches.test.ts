/**
 * Unit tests for branch naming utilities
 */

import { describe, it, expect } from 'vitest';
import {
  FIX_BRANCH_PREFIX,
  getFixBranch,
  parseFixBranch,
  getPullRequestHead
} from '../../src/shared/branches.js';

describe('getFixBranch', () => {
  it('should build fix/issue-{number}', () => {
    expect(getFixBranch(42)).toBe('fix/issue-42');
    expect(getFixBranch(1).startsWith(FIX_BRANCH_PREFIX)).toBe(true);
  });

  it('should reject invalid issue numbers', () => {
    expect(() => getFixBranch(0)).toThrow('Invalid issue number: 0');
    expect(() => getFixBranch(-3)).toThrow('Invalid issue number: -3');
    expect(() => getFixBranch(1.5)).toThrow('Invalid issue number: 1.5');
  });
});

describe('parseFixBranch', () => {
  it('should return the issue number of a fix branch', () => {
    expect(parseFixBranch('fix/issue-42')).toBe(42);
  });

  it('should return null for other branches', () => {
    expect(parseFixBranch('main')).toBeNull();
    expect(parseFixBranch('fix/issue-')).toBeNull();
    expect(parseFixBranch('fix/issue-0')).toBeNull();
    expect(parseFixBranch('feature/fix/issue-3')).toBeNull();
  });

  it('should round-trip with getFixBranch', () => {
    expect(parseFixBranch(getFixBranch(1234))).toBe(1234);
  });
});

describe('getPullRequestHead', () => {
  it('should prefix the branch with the user for repositories they do not own', () => {
    expect(getPullRequestHead('fix/issue-7', 'alice', false)).toBe('alice:fix/issue-7');
  });

  it('should use the bare branch for the user\'s own repository', () => {
    expect(getPullRequestHead('fix/issue-7', 'alice', true)).toBe('fix/issue-7');
  });
});
