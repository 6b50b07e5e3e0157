/**
 * Text Composer
 *
 * Expands `!!!>include(...)` directives into one flat text, depth first
 * and in document order. Expansion runs on an explicit stack of frames,
 * so deep include trees do not grow the call stack, and the inclusion
 * chain is a value the caller can inspect.
 */

import * as path from 'path';
import * as fs from 'fs/promises';
import { classifyLine, splitLines } from './directives';
import { CircularIncludeError, ComponentNotFoundError } from './errors';
import { resolveInclude } from './includeResolver';
import { ComposeContext } from './types';
import { composeLogger } from '../utils/logger';

const log = composeLogger.child('Text');

/**
 * Absolute paths open on the current root-to-leaf branch
 *
 * A path is entered before its file is expanded and left when that
 * expansion ends, so a component may appear on several branches but
 * never inside itself.
 */
export class InclusionChain {
  private readonly open = new Set<string>();

  /**
   * @throws CircularIncludeError if the path is already open
   */
  enter(filePath: string): void {
    if (this.open.has(filePath)) {
      throw new CircularIncludeError(filePath, this.paths());
    }
    this.open.add(filePath);
  }

  leave(filePath: string): void {
    this.open.delete(filePath);
  }

  /** Open paths, outermost first */
  paths(): string[] {
    return [...this.open];
  }

  get size(): number {
    return this.open.size;
  }
}

/**
 * Read a component's text
 *
 * @throws ComponentNotFoundError when the file does not exist
 */
export async function readComponent(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR')) {
      throw new ComponentNotFoundError(path.basename(filePath), `does not exist: ${filePath}`);
    }
    throw err;
  }
}

interface Frame {
  path: string;
  lines: string[];
  next: number;
  output: string[];
}

/**
 * Expand a component file and everything it includes
 *
 * @param filePath - The starting file
 * @param context - Components root and optional filename index
 * @param chain - Paths already open above this file; left as it was
 *   found when this call returns or throws
 * @throws CircularIncludeError, ComponentNotFoundError
 */
export async function composeFile(
  filePath: string,
  context: ComposeContext,
  chain: InclusionChain = new InclusionChain()
): Promise<string> {
  const stack: Frame[] = [];

  const open = async (target: string): Promise<void> => {
    chain.enter(target);
    let text: string;
    try {
      text = await readComponent(target);
    } catch (err) {
      chain.leave(target);
      throw err;
    }
    stack.push({ path: target, lines: splitLines(text), next: 0, output: [] });
  };

  let result = '';
  try {
    await open(path.resolve(filePath));

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.next >= frame.lines.length) {
        stack.pop();
        chain.leave(frame.path);
        const expanded = frame.output.join('');
        const parent = stack[stack.length - 1];
        if (parent) {
          parent.output.push(expanded);
        } else {
          result = expanded;
        }
        continue;
      }

      const line = classifyLine(frame.lines[frame.next], 'component');
      frame.next++;

      if (line.kind === 'include') {
        const target = resolveInclude(line.ref, context.componentsRoot, context.index);
        log.debug('Including component', { ref: line.ref, from: frame.path });
        await open(target);
      } else {
        frame.output.push(line.raw);
      }
    }
  } finally {
    // Frames still on the stack belong to an aborted expansion
    for (const frame of stack) {
      chain.leave(frame.path);
    }
  }

  return result;
}

/**
 * Resolve a reference and compose it
 */
export async function composeComponent(ref: string, context: ComposeContext): Promise<string> {
  const filePath = resolveInclude(ref, context.componentsRoot, context.index);
  return composeFile(filePath, context);
}
