/**
 * Tests for ignore pattern utilities
 */

import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { VCS_IGNORE_PATTERNS, shouldIgnore, mergePatterns } from '../ignorePatterns';

const rel = (...parts: string[]): string => path.join(...parts);

describe('VCS_IGNORE_PATTERNS', () => {
    it('should cover the common version control directories', () => {
        expect(VCS_IGNORE_PATTERNS).toEqual(['.git', '.svn', '.hg']);
    });
});

describe('shouldIgnore', () => {
    it('should match a bare name against any path component', () => {
        expect(shouldIgnore(rel('.git'), ['.git'])).toBe(true);
        expect(shouldIgnore(rel('chapters', '.git', 'HEAD'), ['.git'])).toBe(true);
        expect(shouldIgnore(rel('chapters', 'intro.tex'), ['.git'])).toBe(false);
    });

    it('should match wildcards against file names, including dotfiles', () => {
        expect(shouldIgnore(rel('notes', 'draft.bak'), ['*.bak'])).toBe(true);
        expect(shouldIgnore(rel('.hidden.tex'), ['*.tex'])).toBe(true);
        expect(shouldIgnore(rel('notes', 'draft.tex'), ['*.bak'])).toBe(false);
    });

    it('should match slash patterns against the whole relative path', () => {
        expect(shouldIgnore(rel('drafts', 'old', 'ch1.tex'), ['drafts/**'])).toBe(true);
        expect(shouldIgnore(rel('old', 'ch1.tex'), ['old/*.tex'])).toBe(true);
        expect(shouldIgnore(rel('book', 'old', 'ch1.tex'), ['old/*.tex'])).toBe(false);
    });

    it('should ignore leading and trailing slashes', () => {
        expect(shouldIgnore(rel('archive'), ['/archive/'])).toBe(true);
    });

    it('should skip empty patterns', () => {
        expect(shouldIgnore(rel('intro.tex'), ['', '/'])).toBe(false);
    });

    it('should not ignore anything without patterns', () => {
        expect(shouldIgnore(rel('intro.tex'), [])).toBe(false);
    });
});

describe('mergePatterns', () => {
    it('should combine arrays in order without duplicates', () => {
        expect(mergePatterns(['.git', '.hg'], ['*.bak', '.git'], [])).toEqual(['.git', '.hg', '*.bak']);
    });

    it('should return an empty array for no input', () => {
        expect(mergePatterns()).toEqual([]);
    });
});
