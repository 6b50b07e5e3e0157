/**
 * Shared path resolution utilities for texweave
 *
 * Workspace and project folders in the configuration may be absolute,
 * tilde-prefixed, or relative to the folder that declares them.
 */

import * as path from 'path';
import * as os from 'os';

/**
 * Expand tilde (~) in a file path to the user's home directory
 */
export function expandTilde(filePath: string): string {
    if (!filePath) {
        return filePath;
    }
    if (filePath === '~' || filePath.startsWith('~/')) {
        return path.join(os.homedir(), filePath.slice(1));
    }
    return filePath;
}

/**
 * Resolve a file path relative to a base directory
 * Handles absolute paths, tilde expansion, and relative paths
 *
 * @param filePath - The file path to resolve
 * @param baseDir - The directory relative paths are resolved against
 * @returns The resolved absolute file path
 */
export function resolveFilePath(filePath: string, baseDir: string): string {
    const expanded = expandTilde(filePath);

    if (path.isAbsolute(expanded)) {
        return path.normalize(expanded);
    }

    return path.resolve(expandTilde(baseDir), expanded);
}
