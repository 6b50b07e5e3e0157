/**
 * Status command - summarize the workspace
 */

import { ParsedArgs } from '../args';
import { CliConfig } from '../context';

export async function statusCommand(config: CliConfig, _args: ParsedArgs): Promise<number> {
    const { workspace } = config;

    console.log(`Workspace: ${workspace.name}`);
    console.log(`Folder:    ${workspace.folder}`);
    if (workspace.logFile) {
        console.log(`Log file:  ${workspace.logFile}`);
    }

    const handles = Object.keys(workspace.projects);
    console.log(`\nProjects (${handles.length}):`);
    for (const handle of handles) {
        const project = workspace.projects[handle];
        const marker = handle === config.defaultProject ? '*' : ' ';
        const targetCount = Object.keys(project.composeTargets).length;
        console.log(`${marker} ${handle} - ${project.name}`);
        console.log(`    components: ${project.componentsFolder}`);
        console.log(`    build:      ${project.buildFolder}`);
        console.log(`    root:       ${project.rootComponent}`);
        console.log(`    targets:    ${targetCount}`);
    }
    return 0;
}
