/**
 * Temporary workspaces for CLI tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export function makeWorkspace(files: Record<string, string>): string {
    const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'texweave-cli-')));
    for (const [relativePath, content] of Object.entries(files)) {
        const filePath = path.join(root, relativePath);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, content, 'utf-8');
    }
    return root;
}

export function removeWorkspace(root: string): void {
    fs.rmSync(root, { recursive: true, force: true });
}
