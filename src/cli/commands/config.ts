/**
 * Config command - show or write the `.texweave/config.json` pointer
 *
 * Runs before any workspace is loaded, since it is how one gets set up.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from '../../compose/errors';
import { expandTilde } from '../../utils/pathResolver';
import { ParsedArgs, stringFlag } from '../args';
import {
    findPointerConfig,
    loadWorkspace,
    POINTER_DIR,
    POINTER_FILE,
    PointerConfig,
    selectProject,
    WORKSPACE_FILE,
    writePointerConfig,
} from '../settings';

function isDirectory(dir: string): boolean {
    return fs.existsSync(dir) && fs.statSync(dir).isDirectory();
}

function hasWorkspaceFile(workspaceFolder: string): boolean {
    return fs.existsSync(path.join(workspaceFolder, WORKSPACE_FILE));
}

function printPointer(pointer: PointerConfig): void {
    console.log(`Config file:     ${pointer.configPath}`);
    console.log(`Workspace:       ${pointer.workspaceFolder}`);
    console.log(`Default project: ${pointer.defaultProject ?? '(none)'}`);
}

function warnIfNoWorkspaceFile(workspaceFolder: string): void {
    if (!hasWorkspaceFile(workspaceFolder)) {
        console.error(`Warning: no ${WORKSPACE_FILE} in ${workspaceFolder} yet`);
    }
}

/**
 * The default project must exist when the workspace declares its projects
 */
function checkDefaultProject(workspaceFolder: string, handle: string | undefined): void {
    if (handle !== undefined && hasWorkspaceFile(workspaceFolder)) {
        selectProject(loadWorkspace(workspaceFolder), handle);
    }
}

export async function configCommand(args: ParsedArgs, cwd: string): Promise<number> {
    const workspaceFlag = stringFlag(args, 'workspace');
    const defaultProject = stringFlag(args, 'default-project');

    // Show
    if (workspaceFlag === undefined && defaultProject === undefined) {
        const pointer = findPointerConfig(cwd);
        if (!pointer) {
            console.error(
                `No ${POINTER_DIR}/${POINTER_FILE} found from ${cwd}. Run: texweave config --workspace <dir>`
            );
            return 1;
        }
        printPointer(pointer);
        warnIfNoWorkspaceFile(pointer.workspaceFolder);
        return 0;
    }

    // Point this folder at a workspace
    if (workspaceFlag !== undefined) {
        const workspaceFolder = path.resolve(cwd, expandTilde(workspaceFlag));
        if (!isDirectory(workspaceFolder)) {
            throw new ConfigurationError(`Workspace folder does not exist: ${workspaceFolder}`);
        }
        warnIfNoWorkspaceFile(workspaceFolder);
        checkDefaultProject(workspaceFolder, defaultProject);

        const pointer = writePointerConfig(cwd, workspaceFolder, defaultProject);
        console.log(`Wrote ${pointer.configPath}`);
        printPointer(pointer);
        return 0;
    }

    // Change the default project of the nearest pointer
    const existing = findPointerConfig(cwd);
    if (!existing) {
        throw new ConfigurationError(
            `No ${POINTER_DIR}/${POINTER_FILE} found. Run texweave config --workspace <dir> first.`
        );
    }
    checkDefaultProject(existing.workspaceFolder, defaultProject);

    const pointer = writePointerConfig(
        path.dirname(path.dirname(existing.configPath)),
        existing.workspaceFolder,
        defaultProject
    );
    console.log(`Wrote ${pointer.configPath}`);
    printPointer(pointer);
    return 0;
}
