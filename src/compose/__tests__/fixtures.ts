/**
 * Temporary component trees for filesystem tests
 */

import * as path from 'path';
import * as fs from 'fs/promises';
import * as os from 'os';

export async function makeTempDir(prefix: string = 'texweave-test-'): Promise<string> {
  // realpath so comparisons survive symlinked temp dirs (macOS /var -> /private/var)
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

/**
 * Write `files` (relative path -> content) under `root`
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
