/**
 * Tree command - show the include hierarchy of a project
 */

import { createComposeContext } from '../../compose/buildDriver';
import { buildComponentTree, countDescendants, renderComponentTree } from '../../compose/componentTree';
import { resolveInclude } from '../../compose/includeResolver';
import { ParsedArgs, stringFlag } from '../args';
import { CliConfig } from '../context';
import { selectProject } from '../settings';

export async function treeCommand(config: CliConfig, args: ParsedArgs): Promise<number> {
    const project = selectProject(config.workspace, args.args[0], config.defaultProject);
    const context = createComposeContext(project);

    // --from starts the tree at another component
    const startRef = stringFlag(args, 'from') ?? project.rootComponent;
    const startPath = resolveInclude(startRef, context.componentsRoot, context.index);

    const tree = await buildComponentTree(startPath, context, startRef);
    console.log(renderComponentTree(tree));
    console.log(`\n${countDescendants(tree)} included component(s)`);
    return 0;
}
