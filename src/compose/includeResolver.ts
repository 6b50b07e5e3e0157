/**
 * Resolve include references to absolute paths
 */

import * as path from 'path';
import { ComponentNotFoundError } from './errors';
import { FileIndex } from './types';

/**
 * Whether a reference names a path rather than a bare filename
 */
export function isPathReference(ref: string): boolean {
  return ref.includes('/') || ref.includes(path.sep);
}

/**
 * Resolve an include reference
 *
 * - A reference with a separator is joined to the components root and
 *   the index is not consulted.
 * - Without an index, bare references are joined to the root as well.
 * - Otherwise the bare name is looked up in the index.
 *
 * Existence of joined paths is not checked here; reading them reports it.
 *
 * @throws ComponentNotFoundError for a bare reference missing from the index
 */
export function resolveInclude(ref: string, componentsRoot: string, index?: FileIndex): string {
  if (isPathReference(ref) || index === undefined) {
    return path.resolve(componentsRoot, ref);
  }

  const resolved = index.get(ref);
  if (resolved === undefined) {
    throw new ComponentNotFoundError(ref, 'not found in any subdirectory');
  }
  return resolved;
}
