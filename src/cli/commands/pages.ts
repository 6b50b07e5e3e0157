/**
 * Pages command - show chapter start pages from the last full build
 */

import * as path from 'path';
import { readChapterPages } from '../../compose/auxParser';
import { FULL_BUILD_BASENAME } from '../../compose/buildDriver';
import { ParsedArgs } from '../args';
import { CliConfig } from '../context';
import { selectProject } from '../settings';

export async function pagesCommand(config: CliConfig, args: ParsedArgs): Promise<number> {
    const project = selectProject(config.workspace, args.args[0], config.defaultProject);
    const auxPath = path.join(project.buildFolder, `${FULL_BUILD_BASENAME}.aux`);
    const pages = await readChapterPages(auxPath);

    if (pages.size === 0) {
        console.log(`No chapter pages recorded in ${auxPath}. Run a full compose first.`);
        return 0;
    }

    const chapters = [...pages.keys()].sort((a, b) => a - b);
    for (const chapter of chapters) {
        console.log(`Chapter ${chapter}: page ${pages.get(chapter)}`);
    }
    return 0;
}
