/**
 * Command dispatch, separated from the executable so it can be tested
 */

import * as path from 'path';
import { ConfigurationError, isTexweaveError } from '../compose/errors';
import { cliLogger, getLoggingService, LogLevel } from '../utils/logger';
import { expandTilde } from '../utils/pathResolver';
import { ParsedArgs, parseArgs, stringFlag } from './args';
import { CliConfig } from './context';
import { findPointerConfig, loadWorkspace, POINTER_DIR, POINTER_FILE } from './settings';

// Commands
import { composeCommand } from './commands/compose';
import { treeCommand } from './commands/tree';
import { targetsCommand } from './commands/targets';
import { pagesCommand } from './commands/pages';
import { statusCommand } from './commands/status';
import { configCommand } from './commands/config';

type WorkspaceCommand = (config: CliConfig, args: ParsedArgs) => Promise<number>;
type Command = (args: ParsedArgs, cwd: string) => Promise<number>;

const COMMANDS: Record<string, Command> = {
    compose: withWorkspace(composeCommand),
    tree: withWorkspace(treeCommand),
    targets: withWorkspace(targetsCommand),
    pages: withWorkspace(pagesCommand),
    status: withWorkspace(statusCommand),
    // Runs without a workspace, since it is how one gets configured
    config: configCommand,
};

export function printHelp(): void {
    console.log(`
texweave - compose LaTeX documents from reusable components

USAGE:
    texweave <command> [project] [options]

COMMANDS:
    compose [project]       Compose the project and compile it to PDF
    tree [project]          Show the component include tree
    targets [project]       List compose targets and their chapter numbers
    pages [project]         Show chapter start pages from the last full build
    status                  Summarize the workspace and its projects
    config                  Show or write ${POINTER_DIR}/${POINTER_FILE}
    help                    Show this help message

EXAMPLES:
    texweave compose thesis
    texweave compose thesis --target chap2
    texweave tree thesis --from ch1.tex
    texweave pages
    texweave config --workspace ~/books --default-project thesis

OPTIONS:
    --help, -h              Show this help
    --workspace <dir>       Use this workspace folder instead of ${POINTER_DIR}/${POINTER_FILE}
                            (with config: point ${POINTER_DIR}/${POINTER_FILE} here at it)
    --default-project <p>   With config: project used when none is named
    --target <name>         Build one compose target through the wrapper
    --from <component>      Start the tree at this component
    --verbose               Debug logging and full compiler output
`);
}

/**
 * Locate the workspace from --workspace or the nearest pointer file
 */
function loadCliConfig(args: ParsedArgs, cwd: string): CliConfig {
    const explicit = stringFlag(args, 'workspace');
    const pointer = findPointerConfig(cwd);

    const workspaceFolder = explicit ? path.resolve(cwd, expandTilde(explicit)) : pointer?.workspaceFolder;
    if (!workspaceFolder) {
        throw new ConfigurationError(
            `No workspace configured. Run texweave config --workspace <dir>, or pass --workspace <dir>.`
        );
    }

    return {
        workspace: loadWorkspace(workspaceFolder),
        defaultProject: pointer?.defaultProject,
    };
}

/**
 * Load the workspace and its logging settings before running `command`
 */
function withWorkspace(command: WorkspaceCommand): Command {
    return async (args, cwd) => {
        const config = loadCliConfig(args, cwd);
        getLoggingService().configure({
            level: config.workspace.logLevel,
            logFile: config.workspace.logFile,
        });
        if (args.flags.verbose) {
            getLoggingService().setLevel(LogLevel.DEBUG);
        }
        return command(config, args);
    };
}

/**
 * Run the CLI and return its exit code
 */
export async function run(argv: string[], cwd: string = process.cwd()): Promise<number> {
    const args = parseArgs(argv);
    const command = Object.prototype.hasOwnProperty.call(COMMANDS, args.command)
        ? COMMANDS[args.command]
        : undefined;

    if (args.flags.help || args.flags.h || !command) {
        if (args.command !== 'help' && !command) {
            console.error(`Unknown command: ${args.command}`);
            printHelp();
            return 1;
        }
        printHelp();
        return 0;
    }

    try {
        cliLogger.info(`Running ${args.command}`, { args: args.args });
        return await command(args, cwd);
    } catch (error) {
        if (isTexweaveError(error)) {
            cliLogger.debug('Command failed', { kind: error.kind });
        } else if (error instanceof Error) {
            cliLogger.error('Unexpected failure', error);
        }
        console.error('Error:', error instanceof Error ? error.message : String(error));
        return 1;
    }
}
