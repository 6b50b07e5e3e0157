/**
 * Component file index
 *
 * Maps every bare filename under the components root to its absolute
 * path, so include directives can name a component without its folder.
 * Filenames must therefore be unique across the whole tree.
 */

import * as path from 'path';
import { walkDirectory } from '../shared/fileWalker';
import { mergePatterns, VCS_IGNORE_PATTERNS } from '../shared/ignorePatterns';
import { composeLogger } from '../utils/logger';
import { DuplicateFilenameError } from './errors';
import { FileIndex } from './types';

const log = composeLogger.child('Index');

export interface FileIndexOptions {
  /** Extra glob patterns to leave out of the index */
  exclude?: string[];
}

/**
 * Scan `rootDir` recursively and index every file by name
 *
 * A root that does not exist gives an empty index.
 *
 * @throws DuplicateFilenameError when two files share a name, whether or
 *   not either is ever included
 */
export function buildFileIndex(rootDir: string, options: FileIndexOptions = {}): FileIndex {
  const files = walkDirectory(rootDir, {
    ignorePatterns: mergePatterns(VCS_IGNORE_PATTERNS, options.exclude ?? []),
  });

  const index: FileIndex = new Map();
  for (const filePath of files) {
    const filename = path.basename(filePath);
    const existing = index.get(filename);
    if (existing !== undefined && existing !== filePath) {
      throw new DuplicateFilenameError(filename, existing, filePath);
    }
    index.set(filename, filePath);
  }

  log.debug('Indexed components', { root: rootDir, count: index.size });
  return index;
}
