import { describe, it, expect } from 'vitest';
import { applyUnifiedPatch } from '../src/engine/text/patch';

describe('applyUnifiedPatch', () => {
  it('should replace a line inside its context', () => {
    const patch = ['--- a/list.txt', '+++ b/list.txt', '@@ -1,3 +1,3 @@', ' a', '-b', '+B', ' c'].join('\n');
    expect(applyUnifiedPatch('a\nb\nc\n', patch)).toBe('a\nB\nc\n');
  });

  it('should insert after the named line when nothing is removed', () => {
    expect(applyUnifiedPatch('a\nb\nc\n', '@@ -1,0 +2 @@\n+x')).toBe('a\nx\nb\nc\n');
  });

  it('should apply several hunks in order', () => {
    const patch = ['@@ -1 +1 @@', '-one', '+ONE', '@@ -3 +3 @@', '-three', '+THREE'].join('\n');
    expect(applyUnifiedPatch('one\ntwo\nthree\n', patch)).toBe('ONE\ntwo\nTHREE\n');
  });

  it('should refuse a hunk that does not match', () => {
    expect(() => applyUnifiedPatch('a\nb\n', '@@ -2 +2 @@\n-z\n+y')).toThrow('hunk #1 does not apply at line 2');
  });

  it('should refuse input without hunks', () => {
    expect(() => applyUnifiedPatch('a\n', '')).toThrow('no hunks found');
    expect(() => applyUnifiedPatch('a\n', 'garbage')).toThrow("unexpected line before first hunk: 'garbage'");
  });
});
