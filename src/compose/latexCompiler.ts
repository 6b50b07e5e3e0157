/**
 * LaTeX Compiler
 *
 * Runs the configured LaTeX engine over a composed document and judges
 * the run by whether a PDF appeared.
 */

import { spawn } from 'child_process';
import * as path from 'path';
import * as fs from 'fs/promises';
import { BuildStatus, CommandResult, CommandRunner, CompilerSettings } from './types';
import { buildLogger } from '../utils/logger';

const log = buildLogger.child('Compiler');

export const DEFAULT_COMPILER: CompilerSettings = {
  command: 'pdflatex',
  extraArgs: [],
};

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Run a command and capture output
 *
 * Rejects only when the process cannot be started or times out; a
 * non-zero exit resolves with its code.
 */
export const runCommand: CommandRunner = (command, args, cwd, timeout) => {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { cwd });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    const timer = timeout !== undefined
      ? setTimeout(() => {
        proc.kill('SIGTERM');
        reject(new Error(`${command} timed out after ${timeout}ms`));
      }, timeout)
      : undefined;

    proc.on('error', (err: Error) => {
      clearTimeout(timer);
      reject(err);
    });

    proc.on('close', (code: number | null) => {
      clearTimeout(timer);
      resolve({ stdout, stderr, exitCode: code ?? 1 });
    });
  });
};

/**
 * Run `fn` with the process working directory set to `dir`
 *
 * The previous directory is restored however `fn` ends. Nothing else may
 * depend on the working directory while `fn` runs.
 */
export async function withWorkingDirectory<T>(dir: string, fn: () => Promise<T>): Promise<T> {
  const previous = process.cwd();
  process.chdir(dir);
  try {
    return await fn();
  } finally {
    process.chdir(previous);
  }
}

/**
 * Outcome of one compiler run
 */
export interface CompileOutcome {
  status: BuildStatus;
  pdfPath?: string;
  exitCode?: number;
  log: string;
  errors: string[];
}

/**
 * Arguments passed to the compiler for a source file
 */
export function compilerArgs(settings: CompilerSettings, texFile: string): string[] {
  return ['-interaction=nonstopmode', '-output-directory=.', ...settings.extraArgs, texFile];
}

/**
 * Pull LaTeX error lines ("! Undefined control sequence.") out of a log
 */
export function extractErrorLines(output: string, limit: number = 5): string[] {
  return output
    .split('\n')
    .filter(line => line.startsWith('!') || line.includes('Error:'))
    .slice(0, limit);
}

/**
 * Compile `texFile` inside `buildFolder`
 *
 * The PDF decides the result: present with exit code 0 is success,
 * present with any other code is success with warnings, absent is a
 * failure whatever the exit code. Any PDF already in the build folder
 * is removed first, so only this run's output counts.
 */
export async function compileDocument(
  buildFolder: string,
  texFile: string,
  settings: CompilerSettings = DEFAULT_COMPILER,
  runner: CommandRunner = runCommand
): Promise<CompileOutcome> {
  const basename = texFile.replace(/\.tex$/i, '');
  const pdfPath = path.join(buildFolder, `${basename}.pdf`);
  const args = compilerArgs(settings, texFile);

  // A PDF from an earlier run must not count as output of this one
  await fs.rm(pdfPath, { force: true });

  log.info('Running compiler', { command: settings.command, args, cwd: buildFolder });

  let result: CommandResult;
  try {
    result = await withWorkingDirectory(buildFolder, () =>
      runner(settings.command, args, process.cwd(), settings.timeoutMs)
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn('Compiler could not be run', { command: settings.command, error: message });
    return {
      status: 'failed',
      log: '',
      errors: [`Failed to run ${settings.command}: ${message}`],
    };
  }

  const output = result.stdout + result.stderr;
  const pdfGenerated = await fileExists(pdfPath);

  if (!pdfGenerated) {
    const errors = extractErrorLines(result.stdout);
    if (errors.length === 0) {
      errors.push(`${settings.command} exited with code ${result.exitCode} and wrote no PDF`);
    }
    return { status: 'failed', exitCode: result.exitCode, log: output, errors };
  }

  return {
    status: result.exitCode === 0 ? 'success' : 'warnings',
    pdfPath,
    exitCode: result.exitCode,
    log: output,
    errors: result.exitCode === 0 ? [] : extractErrorLines(result.stdout),
  };
}
