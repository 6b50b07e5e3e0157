/**
 * Compose command - build the whole project or one target to PDF
 */

import { runCompose } from '../../compose/buildDriver';
import { ParsedArgs, stringFlag } from '../args';
import { CliConfig } from '../context';
import { selectProject } from '../settings';

export async function composeCommand(config: CliConfig, args: ParsedArgs): Promise<number> {
    const project = selectProject(config.workspace, args.args[0], config.defaultProject);
    const target = stringFlag(args, 'target');
    const verbose = args.flags.verbose === true;

    const result = await runCompose(project, { target });

    if (result.texPath) {
        console.log(`Generated composed project file: ${result.texPath}`);
    }

    if (result.status === 'failed') {
        console.error(result.message);
        if (verbose && result.log) {
            console.error(result.log);
        }
        return 1;
    }

    console.log(result.message);
    if (verbose && result.log) {
        console.log(result.log);
    }
    return 0;
}
