/**
 * Chapter/Target Wrapper Composer
 *
 * Builds a standalone document for one compose target by splicing the
 * target's body into the shared wrapper template. The wrapper keeps the
 * preamble, bibliography and closing of the full document.
 */

import * as path from 'path';
import { buildNumberingPreamble, deriveChapterNumber } from './chapterNumbering';
import { classifyLine, splitLines } from './directives';
import { MissingConfigurationError } from './errors';
import { resolveInclude } from './includeResolver';
import { composeFile, InclusionChain, readComponent } from './textComposer';
import { ChapterPageMap, ComposeContext, ProjectConfig, ResolvedTarget } from './types';
import { composeLogger } from '../utils/logger';

const log = composeLogger.child('Wrapper');

export interface WrapperComposeOptions extends ComposeContext {
  wrapperPath: string;
  /** Already expanded text of the target */
  targetBody: string;
  /** Numbering setup; dropped when empty */
  targetPreamble?: string;
}

/**
 * Compose the wrapper with the target spliced in
 *
 * Only the wrapper's own lines are read with the sentinel grammar; files
 * it includes are composed as ordinary components.
 */
export async function composeWrapper(options: WrapperComposeOptions): Promise<string> {
  const { wrapperPath, targetBody, targetPreamble = '' } = options;
  const context: ComposeContext = { componentsRoot: options.componentsRoot, index: options.index };

  const absoluteWrapper = path.resolve(wrapperPath);
  const chain = new InclusionChain();
  chain.enter(absoluteWrapper);

  try {
    const lines = splitLines(await readComponent(absoluteWrapper));
    const output: string[] = [];

    for (const raw of lines) {
      const line = classifyLine(raw, 'wrapper');
      switch (line.kind) {
        case 'target':
          output.push(targetBody.endsWith('\n') ? targetBody : targetBody + '\n');
          break;
        case 'preamble':
          if (targetPreamble) {
            output.push(targetPreamble);
          }
          break;
        case 'include': {
          const included = resolveInclude(line.ref, context.componentsRoot, context.index);
          output.push(await composeFile(included, context, chain));
          break;
        }
        case 'text':
          output.push(line.raw);
          break;
      }
    }

    return output.join('');
  } finally {
    chain.leave(absoluteWrapper);
  }
}

/**
 * Look up a target in the project and resolve its component
 *
 * @throws MissingConfigurationError when the project has no targets or
 *   does not know `targetName`
 */
export function resolveTarget(project: ProjectConfig, targetName: string, context: ComposeContext): ResolvedTarget {
  const names = Object.keys(project.composeTargets);
  if (names.length === 0) {
    throw new MissingConfigurationError(`Project '${project.handle}' defines no compose targets`);
  }

  if (!names.includes(targetName)) {
    throw new MissingConfigurationError(
      `Unknown target '${targetName}' for project '${project.handle}'. Valid targets: ${names.join(', ')}`
    );
  }

  const ref = project.composeTargets[targetName];
  return {
    name: targetName,
    ref,
    path: resolveInclude(ref, context.componentsRoot, context.index),
    chapter: deriveChapterNumber(targetName, ref),
  };
}

/**
 * Compose one target of a project into a full standalone document
 *
 * @param pageMap - Chapter start pages from the last full build
 * @throws MissingConfigurationError, plus any composition error
 */
export async function composeTarget(
  project: ProjectConfig,
  targetName: string,
  context: ComposeContext,
  pageMap: ChapterPageMap
): Promise<string> {
  if (!project.wrapper) {
    throw new MissingConfigurationError(
      `Project '${project.handle}' has no wrapper; target builds need one`
    );
  }

  const target = resolveTarget(project, targetName, context);
  const wrapperPath = resolveInclude(project.wrapper, context.componentsRoot, context.index);

  const targetBody = await composeFile(target.path, context);
  const targetPreamble = buildNumberingPreamble(target.chapter, pageMap);

  log.info('Composing target', {
    target: target.name,
    component: target.ref,
    chapter: target.chapter ?? null,
    startPage: target.chapter !== undefined ? pageMap.get(target.chapter) ?? null : null,
  });

  return composeWrapper({
    ...context,
    wrapperPath,
    targetBody,
    targetPreamble,
  });
}
