/**
 * Include hierarchy of a component, for display
 */

import * as path from 'path';
import { classifyLine, splitLines } from './directives';
import { resolveInclude } from './includeResolver';
import { InclusionChain, readComponent } from './textComposer';
import { ComponentTreeNode, ComposeContext } from './types';

/**
 * Follow include directives from `filePath` and return the tree
 *
 * Uses the same resolution and per-branch cycle guard as composition.
 *
 * @throws CircularIncludeError, ComponentNotFoundError
 */
export async function buildComponentTree(
  filePath: string,
  context: ComposeContext,
  name: string = path.basename(filePath),
  chain: InclusionChain = new InclusionChain()
): Promise<ComponentTreeNode> {
  const absolutePath = path.resolve(filePath);
  chain.enter(absolutePath);

  try {
    const node: ComponentTreeNode = { name, path: absolutePath, children: [] };
    for (const raw of splitLines(await readComponent(absolutePath))) {
      const line = classifyLine(raw);
      if (line.kind !== 'include') {
        continue;
      }
      const child = resolveInclude(line.ref, context.componentsRoot, context.index);
      node.children.push(await buildComponentTree(child, context, line.ref, chain));
    }
    return node;
  } finally {
    chain.leave(absolutePath);
  }
}

/**
 * Render a tree with box-drawing connectors, one node per line
 */
export function renderComponentTree(root: ComponentTreeNode): string {
  const lines: string[] = [root.name];

  const walk = (node: ComponentTreeNode, prefix: string): void => {
    node.children.forEach((child, i) => {
      const last = i === node.children.length - 1;
      lines.push(`${prefix}${last ? '└── ' : '├── '}${child.name}`);
      walk(child, prefix + (last ? '    ' : '│   '));
    });
  };

  walk(root, '');
  return lines.join('\n');
}

/**
 * Count every node below the root
 */
export function countDescendants(node: ComponentTreeNode): number {
  return node.children.reduce((total, child) => total + 1 + countDescendants(child), 0);
}
