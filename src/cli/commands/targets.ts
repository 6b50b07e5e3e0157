/**
 * Targets command - list a project's compose targets
 */

import { deriveChapterNumber } from '../../compose/chapterNumbering';
import { ParsedArgs } from '../args';
import { CliConfig } from '../context';
import { selectProject } from '../settings';

export async function targetsCommand(config: CliConfig, args: ParsedArgs): Promise<number> {
    const project = selectProject(config.workspace, args.args[0], config.defaultProject);
    const entries = Object.entries(project.composeTargets);

    if (entries.length === 0) {
        console.log(`Project '${project.handle}' has no compose targets.`);
        return 0;
    }

    console.log(`Wrapper: ${project.wrapper ?? '(none - target builds will fail)'}`);
    const width = Math.max(...entries.map(([name]) => name.length));
    for (const [name, ref] of entries) {
        const chapter = deriveChapterNumber(name, ref);
        const numbering = chapter !== undefined ? `chapter ${chapter}` : 'unnumbered';
        console.log(`  ${name.padEnd(width)}  ${ref}  (${numbering})`);
    }
    return 0;
}
