/**
 * Shared ignore pattern utilities
 * Used by the component index walker and the project exclude setting
 */

import * as path from 'path';
import { minimatch } from 'minimatch';

/**
 * Version-control metadata directories. They hold files such as HEAD and
 * config at several depths, so they are never part of a component tree.
 */
export const VCS_IGNORE_PATTERNS: string[] = [
    '.git',
    '.svn',
    '.hg'
];

/**
 * Check if a relative path should be ignored based on patterns
 *
 * Patterns without a slash match any single path component
 * ("*.bak", ".git"); patterns with a slash match the whole relative
 * path ("drafts/**", "old/*.tex").
 *
 * @param relativePath Path relative to the walk root
 * @param patterns Array of ignore patterns
 */
export function shouldIgnore(relativePath: string, patterns: string[]): boolean {
    const parts = relativePath.split(path.sep);
    const posixPath = parts.join('/');

    for (const pattern of patterns) {
        // Clean up pattern - remove leading/trailing slashes
        const cleanPattern = pattern.replace(/^\//, '').replace(/\/$/, '');
        if (!cleanPattern) {
            continue;
        }

        if (cleanPattern.includes('/')) {
            if (minimatch(posixPath, cleanPattern, { dot: true })) {
                return true;
            }
        } else if (parts.some(part => minimatch(part, cleanPattern, { dot: true }))) {
            return true;
        }
    }

    return false;
}

/**
 * Combine multiple pattern arrays, deduplicating
 */
export function mergePatterns(...patternArrays: string[][]): string[] {
    const combined = new Set<string>();
    for (const patterns of patternArrays) {
        for (const pattern of patterns) {
            combined.add(pattern);
        }
    }
    return Array.from(combined);
}
