/**
 * Chapter start pages from a LaTeX .aux file
 *
 * LaTeX records table-of-contents entries in the .aux file as
 *   \@writefile{toc}{\contentsline {chapter}{\numberline {2}Methods}{15}{chapter.2}}
 * The first number is the chapter, the braced number after the title is
 * the page it starts on.
 */

import * as fs from 'fs/promises';
import { ChapterPageMap } from './types';

const CHAPTER_ENTRY_PATTERN = /\\contentsline\s*\{chapter\}\s*\{\\numberline\s*\{(\d+)\}.*?\}\s*\{(\d+)\}/;

/**
 * Parse chapter entries out of .aux text
 *
 * When a chapter appears more than once, the last entry wins.
 */
export function parseChapterPages(auxText: string): ChapterPageMap {
  const pages: ChapterPageMap = new Map();

  for (const line of auxText.split('\n')) {
    const match = CHAPTER_ENTRY_PATTERN.exec(line);
    if (match) {
      pages.set(parseInt(match[1], 10), parseInt(match[2], 10));
    }
  }

  return pages;
}

/**
 * Read and parse an .aux file; a missing file gives an empty map
 */
export async function readChapterPages(auxPath: string): Promise<ChapterPageMap> {
  let text: string;
  try {
    text = await fs.readFile(auxPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return new Map();
    }
    throw err;
  }
  return parseChapterPages(text);
}
