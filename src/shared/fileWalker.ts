/**
 * Shared file walking utilities
 * Used by the component index
 */

import * as fs from 'fs';
import * as path from 'path';
import { shouldIgnore } from './ignorePatterns';
import { createLogger } from '../utils/logger';

const log = createLogger('FileWalker');

/**
 * Options for file walking
 */
export interface FileWalkerOptions {
    /** Patterns matched against the path relative to rootDir */
    ignorePatterns?: string[];
}

/**
 * Walk a directory recursively and list its files, hidden ones included
 *
 * Entries are visited in name order so results are stable across
 * platforms. A missing root yields no files.
 *
 * @returns Absolute file paths in walk order
 */
export function walkDirectory(rootDir: string, options: FileWalkerOptions = {}): string[] {
    const { ignorePatterns = [] } = options;

    const root = path.resolve(rootDir);
    const files: string[] = [];

    if (!fs.existsSync(root)) {
        log.debug('Walk root does not exist', { root });
        return files;
    }

    const walk = (dir: string): void => {
        let entries: fs.Dirent[];
        try {
            entries = fs.readdirSync(dir, { withFileTypes: true });
        } catch (error) {
            // Unreadable directories are skipped, not fatal to the walk
            log.warn('Skipping unreadable directory', {
                dir,
                error: error instanceof Error ? error.message : String(error)
            });
            return;
        }

        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        for (const entry of entries) {
            const fullPath = path.join(dir, entry.name);

            const relativePath = path.relative(root, fullPath);
            if (ignorePatterns.length > 0 && shouldIgnore(relativePath, ignorePatterns)) {
                continue;
            }

            if (entry.isDirectory()) {
                walk(fullPath);
            } else if (entry.isFile()) {
                files.push(fullPath);
            }
        }
    };

    walk(root);

    return files;
}
