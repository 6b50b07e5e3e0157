/**
 * Tests for chapter page extraction from .aux files
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { parseChapterPages, readChapterPages } from '../auxParser';
import { makeTempDir, removeTempDir, writeTree } from './fixtures';

const AUX = `\\relax
\\@writefile{toc}{\\contentsline {chapter}{\\numberline {1}Introduction}{1}{chapter.1}\\protected@file@percent }
\\@writefile{lof}{\\addvspace {10\\p@ }}
\\@writefile{toc}{\\contentsline {section}{\\numberline {1.1}Background}{2}{section.1.1}\\protected@file@percent }
\\@writefile{toc}{\\contentsline {chapter}{\\numberline {2}Methods and \\textit {Data}}{15}{chapter.2}\\protected@file@percent }
\\@writefile{toc}{\\contentsline {chapter}{Bibliography}{40}{chapter*.5}\\protected@file@percent }
`;

describe('parseChapterPages', () => {
  it('should map numbered chapters to their start pages', () => {
    expect(parseChapterPages(AUX)).toEqual(new Map([[1, 1], [2, 15]]));
  });

  it('should ignore sections and unnumbered chapters', () => {
    const pages = parseChapterPages(AUX);
    expect(pages.size).toBe(2);
  });

  it('should keep the last entry for a repeated chapter', () => {
    const text = [
      '\\contentsline {chapter}{\\numberline {3}Old}{20}{chapter.3}',
      '\\contentsline {chapter}{\\numberline {3}New}{22}{chapter.3}',
    ].join('\n');
    expect(parseChapterPages(text)).toEqual(new Map([[3, 22]]));
  });

  it('should accept the macro without spaces', () => {
    expect(parseChapterPages('\\contentsline{chapter}{\\numberline{4}Four}{31}{}')).toEqual(new Map([[4, 31]]));
  });

  it('should return an empty map for text without chapters', () => {
    expect(parseChapterPages('\\relax\n').size).toBe(0);
  });
});

describe('readChapterPages', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should read an aux file from disk', async () => {
    await writeTree(dir, { 'composed_project.aux': AUX });
    const pages = await readChapterPages(path.join(dir, 'composed_project.aux'));
    expect(pages.get(2)).toBe(15);
  });

  it('should return an empty map when the file is missing', async () => {
    expect((await readChapterPages(path.join(dir, 'none.aux'))).size).toBe(0);
  });
});
