import { describe, it, expect, beforeEach } from 'vitest';
import {
  clearPatternCache,
  findMatchingPatterns,
  getCacheSize,
  getPatternRegex,
  hasWildcard,
  matchesPattern,
} from './wildcard.js';

describe('wildcard', () => {
  beforeEach(() => {
    clearPatternCache();
  });

  it('should detect wildcard patterns', () => {
    expect(hasWildcard('fsm:enter:*')).toBe(true);
    expect(hasWildcard('fsm:transition')).toBe(false);
  });

  it('should match exact names without compiling a pattern', () => {
    expect(matchesPattern('fsm:transition', 'fsm:transition')).toBe(true);
    expect(matchesPattern('fsm:transitions', 'fsm:transition')).toBe(false);
    expect(getCacheSize()).toBe(0);
  });

  it('should match a single segment with *', () => {
    expect(matchesPattern('fsm:enter:PLANNING', 'fsm:enter:*')).toBe(true);
    expect(matchesPattern('fsm:enter:', 'fsm:enter:*')).toBe(false);
    expect(matchesPattern('fsm:enter:PLANNING:extra', 'fsm:enter:*')).toBe(false);
  });

  it('should match any number of segments with **', () => {
    expect(matchesPattern('fsm:enter:PLANNING', 'fsm:**')).toBe(true);
    expect(matchesPattern('fsm:reset', 'fsm:**')).toBe(true);
    expect(matchesPattern('other:reset', 'fsm:**')).toBe(false);
    expect(matchesPattern('anything:at:all', '**')).toBe(true);
  });

  it('should treat a lone * as one segment', () => {
    expect(matchesPattern('reset', '*')).toBe(true);
    expect(matchesPattern('fsm:reset', '*')).toBe(false);
  });

  it('should escape regex characters outside the wildcards', () => {
    expect(matchesPattern('fsm.v1:enter:IDLE', 'fsm.v1:enter:*')).toBe(true);
    expect(matchesPattern('fsmXv1:enter:IDLE', 'fsm.v1:enter:*')).toBe(false);
  });

  it('should honor a custom delimiter', () => {
    expect(matchesPattern('fsm/enter/IDLE', 'fsm/enter/*', '/')).toBe(true);
    expect(matchesPattern('fsm/enter/IDLE/x', 'fsm/enter/*', '/')).toBe(false);
  });

  it('should cache compiled patterns', () => {
    const first = getPatternRegex('fsm:*');
    const second = getPatternRegex('fsm:*');
    expect(second).toBe(first);
    expect(getCacheSize()).toBe(1);
  });

  it('should find every matching pattern', () => {
    const patterns = ['fsm:transition', 'fsm:*', 'fsm:enter:*', 'fsm:**'];
    expect(findMatchingPatterns('fsm:transition', patterns)).toEqual([
      'fsm:transition',
      'fsm:*',
      'fsm:**',
    ]);
  });
});
