/**
 * Build Driver
 *
 * One compose cycle: index the components, compose the whole document or
 * one target, write it into the build folder and compile it.
 */

import * as path from 'path';
import * as fs from 'fs/promises';
import { readChapterPages } from './auxParser';
import { isTexweaveError } from './errors';
import { buildFileIndex } from './fileIndex';
import { compileDocument } from './latexCompiler';
import { composeComponent } from './textComposer';
import { BuildResult, CommandRunner, ComposeContext, ProjectConfig } from './types';
import { composeTarget } from './wrapperComposer';
import { buildLogger } from '../utils/logger';

const log = buildLogger;

/** Basename of the full document; its .aux feeds target page numbers */
export const FULL_BUILD_BASENAME = 'composed_project';

export interface ComposeOptions {
  /** Build one target through the wrapper instead of the whole project */
  target?: string;
  /** Replaces the real compiler process */
  runner?: CommandRunner;
}

/**
 * Name of the generated source file for a build
 */
export function composedFileName(target?: string): string {
  return target ? `composed_${target}.tex` : `${FULL_BUILD_BASENAME}.tex`;
}

/**
 * Index a project's components. Rebuilt on every call, never cached.
 */
export function createComposeContext(project: ProjectConfig): ComposeContext {
  return {
    componentsRoot: project.componentsFolder,
    index: buildFileIndex(project.componentsFolder, { exclude: project.exclude }),
  };
}

/**
 * Compose the text for a build without writing or compiling it
 */
export async function composeProjectText(project: ProjectConfig, target?: string): Promise<string> {
  const context = createComposeContext(project);

  if (target === undefined) {
    return composeComponent(project.rootComponent, context);
  }

  const auxPath = path.join(project.buildFolder, `${FULL_BUILD_BASENAME}.aux`);
  const pageMap = await readChapterPages(auxPath);
  log.debug('Loaded chapter pages', { auxPath, chapters: pageMap.size });
  return composeTarget(project, target, context, pageMap);
}

/**
 * Run one compose cycle
 *
 * Composition and configuration errors are reported in the result, not
 * thrown; only unexpected failures (such as an unwritable build folder)
 * propagate.
 */
export async function runCompose(project: ProjectConfig, options: ComposeOptions = {}): Promise<BuildResult> {
  const { target, runner } = options;
  log.info('Composing project', { project: project.handle, target: target ?? null });

  let text: string;
  try {
    text = await composeProjectText(project, target);
  } catch (err) {
    if (isTexweaveError(err)) {
      log.error('Composition failed', err, { kind: err.kind });
      return { status: 'failed', log: '', message: err.message };
    }
    throw err;
  }

  await fs.mkdir(project.buildFolder, { recursive: true });
  const texFile = composedFileName(target);
  const texPath = path.join(project.buildFolder, texFile);
  await fs.writeFile(texPath, text, 'utf-8');
  log.info('Generated composed file', { texPath });

  const outcome = await compileDocument(project.buildFolder, texFile, project.compiler, runner);

  switch (outcome.status) {
    case 'success':
      return {
        status: 'success',
        texPath,
        pdfPath: outcome.pdfPath,
        exitCode: outcome.exitCode,
        log: outcome.log,
        message: `LaTeX compilation successful: ${outcome.pdfPath}`,
      };
    case 'warnings':
      log.warn('Compiler reported problems but wrote a PDF', { exitCode: outcome.exitCode, errors: outcome.errors });
      return {
        status: 'warnings',
        texPath,
        pdfPath: outcome.pdfPath,
        exitCode: outcome.exitCode,
        log: outcome.log,
        message: `LaTeX compilation successful with warnings (exit code ${outcome.exitCode}): ${outcome.pdfPath}`,
      };
    case 'failed':
      log.warn('Compilation failed', { errors: outcome.errors });
      return {
        status: 'failed',
        texPath,
        exitCode: outcome.exitCode,
        log: outcome.log,
        message: `LaTeX compilation failed: ${outcome.errors.join('; ')}. Re-run with --verbose for the full compiler output.`,
      };
  }
}
