/**
 * Chapter numbers for compose targets, and the LaTeX that pins them
 */

import * as path from 'path';
import { ChapterPageMap } from './types';

const TARGET_CHAPTER_PATTERN = /^chap(\d+)$/;
const FILENAME_CHAPTER_PATTERN = /^(\d+)_/;

/**
 * Derive a target's chapter number
 *
 * `chap5` -> 5 from the target name; otherwise a leading `7_` on the
 * referenced file's basename -> 7; otherwise undefined.
 */
export function deriveChapterNumber(targetName: string, componentRef: string): number | undefined {
  const fromName = TARGET_CHAPTER_PATTERN.exec(targetName);
  if (fromName) {
    return parseInt(fromName[1], 10);
  }

  const fromFile = FILENAME_CHAPTER_PATTERN.exec(path.basename(componentRef));
  if (fromFile) {
    return parseInt(fromFile[1], 10);
  }

  return undefined;
}

/**
 * LaTeX that makes a standalone chapter build number like the full book
 *
 * The chapter counter is set one below, since `\chapter` increments it.
 * The page counter is set only when the last full build recorded where
 * that chapter starts.
 */
export function buildNumberingPreamble(chapter: number | undefined, pageMap: ChapterPageMap): string {
  if (chapter === undefined) {
    return '';
  }

  const lines = [`\\setcounter{chapter}{${chapter - 1}}`];
  const startPage = pageMap.get(chapter);
  if (startPage !== undefined) {
    lines.push(`\\setcounter{page}{${startPage}}`);
  }
  return lines.join('\n') + '\n';
}
