/**
 * CLI Settings - locate and read the workspace configuration
 *
 * A `.texweave/config.json` pointer file, found by walking up from the
 * current directory, names the workspace folder. The workspace folder
 * holds `workspace.json`, which declares the projects.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CompilerSettings, ProjectConfig } from '../compose/types';
import { ConfigurationError } from '../compose/errors';
import { DEFAULT_COMPILER } from '../compose/latexCompiler';
import { LogLevel, parseLogLevel, configLogger } from '../utils/logger';
import { expandTilde, resolveFilePath } from '../utils/pathResolver';

export const POINTER_DIR = '.texweave';
export const POINTER_FILE = 'config.json';
export const WORKSPACE_FILE = 'workspace.json';

/**
 * Contents of `.texweave/config.json`
 */
export interface PointerConfig {
    workspaceFolder: string;
    defaultProject?: string;
    /** Where the pointer was found */
    configPath: string;
}

/**
 * Contents of `workspace.json`, with paths resolved
 */
export interface WorkspaceConfig {
    name: string;
    folder: string;
    logLevel?: LogLevel;
    /** Absolute path of the JSON-lines log file, if logging to file */
    logFile?: string;
    projects: Record<string, ProjectConfig>;
}

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(obj: JsonObject, key: string, where: string): string | undefined {
    const value = obj[key];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'string' || value.trim() === '') {
        throw new ConfigurationError(`${where}: '${key}' must be a non-empty string`);
    }
    return value;
}

function requireString(obj: JsonObject, key: string, where: string): string {
    const value = readString(obj, key, where);
    if (value === undefined) {
        throw new ConfigurationError(`${where}: '${key}' is required`);
    }
    return value;
}

function readStringArray(obj: JsonObject, key: string, where: string): string[] {
    const value = obj[key];
    if (value === undefined) {
        return [];
    }
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw new ConfigurationError(`${where}: '${key}' must be an array of strings`);
    }
    return value;
}

function readStringRecord(obj: JsonObject, key: string, where: string): Record<string, string> {
    const value = obj[key];
    if (value === undefined) {
        return {};
    }
    if (!isRecord(value)) {
        throw new ConfigurationError(`${where}: '${key}' must be an object`);
    }
    const result: Record<string, string> = {};
    for (const [name, entry] of Object.entries(value)) {
        if (typeof entry !== 'string' || entry.trim() === '') {
            throw new ConfigurationError(`${where}: '${key}.${name}' must be a non-empty string`);
        }
        result[name] = entry;
    }
    return result;
}

/**
 * Read and parse a JSON file into an object
 */
function readJsonObject(filePath: string): JsonObject {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
        throw new ConfigurationError(
            `Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`
        );
    }
    if (!isRecord(parsed)) {
        throw new ConfigurationError(`${filePath} must contain a JSON object`);
    }
    return parsed;
}

/**
 * Find the nearest `.texweave/config.json`, walking up from `startDir`
 */
export function findPointerConfig(startDir: string = process.cwd()): PointerConfig | undefined {
    let dir = path.resolve(startDir);
    for (;;) {
        const configPath = path.join(dir, POINTER_DIR, POINTER_FILE);
        if (fs.existsSync(configPath)) {
            const data = readJsonObject(configPath);
            return {
                workspaceFolder: resolveFilePath(requireString(data, 'workspaceFolder', configPath), dir),
                defaultProject: readString(data, 'defaultProject', configPath),
                configPath,
            };
        }
        const parent = path.dirname(dir);
        if (parent === dir) {
            return undefined;
        }
        dir = parent;
    }
}

/**
 * Write `<dir>/.texweave/config.json`, replacing any pointer already there
 */
export function writePointerConfig(
    dir: string,
    workspaceFolder: string,
    defaultProject?: string
): PointerConfig {
    const configPath = path.join(dir, POINTER_DIR, POINTER_FILE);
    const data: JsonObject = { workspaceFolder };
    if (defaultProject !== undefined) {
        data.defaultProject = defaultProject;
    }

    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    configLogger.info('Wrote pointer config', { configPath, workspaceFolder, defaultProject });

    return { workspaceFolder, defaultProject, configPath };
}

function parseCompiler(value: unknown, where: string): CompilerSettings {
    if (value === undefined) {
        return { ...DEFAULT_COMPILER, extraArgs: [...DEFAULT_COMPILER.extraArgs] };
    }
    if (!isRecord(value)) {
        throw new ConfigurationError(`${where}: 'compiler' must be an object`);
    }
    const rawTimeout = value.timeoutMs;
    let timeoutMs: number | undefined;
    if (rawTimeout !== undefined) {
        if (typeof rawTimeout !== 'number' || !(rawTimeout > 0)) {
            throw new ConfigurationError(`${where}: 'compiler.timeoutMs' must be a positive number`);
        }
        timeoutMs = rawTimeout;
    }
    return {
        command: readString(value, 'command', `${where}.compiler`) ?? DEFAULT_COMPILER.command,
        extraArgs: readStringArray(value, 'extraArgs', `${where}.compiler`),
        timeoutMs,
    };
}

/**
 * Validate one project entry and resolve its folders
 *
 * projectFolder resolves against the workspace folder; components and
 * build folders resolve against the project folder.
 */
export function parseProject(handle: string, value: unknown, workspaceFolder: string): ProjectConfig {
    const where = `projects.${handle}`;
    if (!isRecord(value)) {
        throw new ConfigurationError(`${where} must be an object`);
    }

    const projectFolder = resolveFilePath(readString(value, 'projectFolder', where) ?? handle, workspaceFolder);

    return {
        handle,
        name: readString(value, 'name', where) ?? handle,
        projectFolder,
        componentsFolder: resolveFilePath(readString(value, 'componentsFolder', where) ?? 'components', projectFolder),
        buildFolder: resolveFilePath(readString(value, 'buildFolder', where) ?? 'build', projectFolder),
        rootComponent: requireString(value, 'rootComponent', where),
        wrapper: readString(value, 'wrapper', where),
        composeTargets: readStringRecord(value, 'composeTargets', where),
        exclude: readStringArray(value, 'exclude', where),
        compiler: parseCompiler(value.compiler, where),
    };
}

/**
 * Load `workspace.json` from a workspace folder
 */
export function loadWorkspace(workspaceFolder: string): WorkspaceConfig {
    const folder = path.resolve(expandTilde(workspaceFolder));
    const configPath = path.join(folder, WORKSPACE_FILE);
    if (!fs.existsSync(configPath)) {
        throw new ConfigurationError(`No ${WORKSPACE_FILE} found in ${folder}`);
    }

    const data = readJsonObject(configPath);

    const levelName = readString(data, 'logLevel', WORKSPACE_FILE);
    const logLevel = parseLogLevel(levelName);
    if (levelName !== undefined && logLevel === undefined) {
        throw new ConfigurationError(`${WORKSPACE_FILE}: 'logLevel' must be one of debug, info, warn, error`);
    }

    const logFile = readString(data, 'logFile', WORKSPACE_FILE);

    const projectsValue = data.projects;
    if (!isRecord(projectsValue)) {
        throw new ConfigurationError(`${WORKSPACE_FILE}: 'projects' must be an object`);
    }

    const projects: Record<string, ProjectConfig> = {};
    for (const [handle, value] of Object.entries(projectsValue)) {
        projects[handle] = parseProject(handle, value, folder);
    }

    configLogger.debug('Loaded workspace', { configPath, projects: Object.keys(projects) });

    return {
        name: readString(data, 'name', WORKSPACE_FILE) ?? path.basename(folder),
        folder,
        logLevel,
        logFile: logFile ? resolveFilePath(logFile, folder) : undefined,
        projects,
    };
}

/**
 * Pick a project: the explicit handle, else the default, else the only one
 */
export function selectProject(
    workspace: WorkspaceConfig,
    handle: string | undefined,
    defaultProject?: string
): ProjectConfig {
    const handles = Object.keys(workspace.projects);
    const chosen = handle ?? defaultProject ?? (handles.length === 1 ? handles[0] : undefined);

    if (chosen === undefined) {
        throw new ConfigurationError(
            `Specify a project. Available projects: ${handles.join(', ') || '(none)'}`
        );
    }
    if (!handles.includes(chosen)) {
        throw new ConfigurationError(
            `Unknown project '${chosen}'. Available projects: ${handles.join(', ') || '(none)'}`
        );
    }
    return workspace.projects[chosen];
}
