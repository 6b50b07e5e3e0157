/**
 * Directive recognition for component files
 *
 * A directive must fill the whole line once trailing whitespace is
 * trimmed. Anything else, including a directive in the middle of a line,
 * is plain text.
 */

import { ComponentLine, DirectiveGrammar } from './types';

export const TARGET_SENTINEL = '!!!>include_target';
export const PREAMBLE_SENTINEL = '!!!>target_preamble';

const INCLUDE_PATTERN = /^!!!>include\((.+)\)$/;

/**
 * Split text into lines, each keeping its own terminator
 *
 * `\r\n` stays attached to its line; a final line without a newline is
 * kept as is. Joining the result gives back the input exactly.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  return text.split(/(?<=\n)/);
}

/**
 * Classify one line under the given grammar
 */
export function classifyLine(raw: string, grammar: DirectiveGrammar = 'component'): ComponentLine {
  const stripped = raw.trimEnd();

  if (grammar === 'wrapper') {
    if (stripped === TARGET_SENTINEL) {
      return { kind: 'target', raw };
    }
    if (stripped === PREAMBLE_SENTINEL) {
      return { kind: 'preamble', raw };
    }
  }

  const match = INCLUDE_PATTERN.exec(stripped);
  if (match) {
    const ref = match[1].trim();
    if (ref) {
      return { kind: 'include', raw, ref };
    }
  }

  return { kind: 'text', raw };
}
