/**
 * Tests for target builds through the wrapper template
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { buildFileIndex } from '../fileIndex';
import { buildNumberingPreamble, deriveChapterNumber } from '../chapterNumbering';
import { composeTarget, composeWrapper, resolveTarget } from '../wrapperComposer';
import { CircularIncludeError, MissingConfigurationError } from '../errors';
import { ComposeContext, ProjectConfig } from '../types';
import { makeTempDir, removeTempDir, writeTree } from './fixtures';

describe('deriveChapterNumber', () => {
  it('should take the number from a chapN target name', () => {
    expect(deriveChapterNumber('chap5', 'x.tex')).toBe(5);
  });

  it('should prefer the target name over the filename', () => {
    expect(deriveChapterNumber('chap2', '7_intro.tex')).toBe(2);
  });

  it('should fall back to a numeric filename prefix', () => {
    expect(deriveChapterNumber('introX', '7_intro.tex')).toBe(7);
  });

  it('should use the basename of a path reference', () => {
    expect(deriveChapterNumber('methods', 'part2/12_methods.tex')).toBe(12);
  });

  it('should give no number when neither pattern matches', () => {
    expect(deriveChapterNumber('introX', 'intro.tex')).toBeUndefined();
    expect(deriveChapterNumber('chapter', 'intro_7.tex')).toBeUndefined();
  });

  it('should require digits right after chap', () => {
    expect(deriveChapterNumber('chap5b', 'x.tex')).toBeUndefined();
  });
});

describe('buildNumberingPreamble', () => {
  it('should set the chapter counter one below the chapter', () => {
    expect(buildNumberingPreamble(5, new Map())).toBe('\\setcounter{chapter}{4}\n');
  });

  it('should set the page counter when the start page is known', () => {
    expect(buildNumberingPreamble(2, new Map([[1, 1], [2, 15]]))).toBe(
      '\\setcounter{chapter}{1}\n\\setcounter{page}{15}\n'
    );
  });

  it('should be empty without a chapter number', () => {
    expect(buildNumberingPreamble(undefined, new Map([[1, 1]]))).toBe('');
  });
});

describe('composeWrapper', () => {
  let root: string;
  let context: ComposeContext;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  const setup = async (files: Record<string, string>) => {
    await writeTree(root, files);
    context = { componentsRoot: root, index: buildFileIndex(root) };
  };

  it('should splice body, preamble and includes', async () => {
    await setup({
      'wrapper.tex': '!!!>include(head.tex)\n!!!>target_preamble\n\\begin{document}\n!!!>include_target\n\\end{document}\n',
      'head.tex': '\\documentclass{book}\n',
    });

    const result = await composeWrapper({
      ...context,
      wrapperPath: path.join(root, 'wrapper.tex'),
      targetBody: '\\chapter{Two}\nText\n',
      targetPreamble: '\\setcounter{chapter}{1}\n',
    });

    expect(result).toBe(
      '\\documentclass{book}\n\\setcounter{chapter}{1}\n\\begin{document}\n\\chapter{Two}\nText\n\\end{document}\n'
    );
  });

  it('should add a newline to a body that lacks one', async () => {
    await setup({ 'wrapper.tex': '!!!>include_target\nend\n' });

    const result = await composeWrapper({ ...context, wrapperPath: path.join(root, 'wrapper.tex'), targetBody: 'body' });
    expect(result).toBe('body\nend\n');
  });

  it('should drop the preamble sentinel when there is no preamble', async () => {
    await setup({ 'wrapper.tex': 'a\n!!!>target_preamble\nb\n' });

    const result = await composeWrapper({
      ...context,
      wrapperPath: path.join(root, 'wrapper.tex'),
      targetBody: '',
      targetPreamble: '',
    });
    expect(result).toBe('a\nb\n');
  });

  it('should leave sentinels inside included files as text', async () => {
    await setup({
      'wrapper.tex': '!!!>include(inner.tex)\n',
      'inner.tex': '!!!>include_target\n',
    });

    const result = await composeWrapper({ ...context, wrapperPath: path.join(root, 'wrapper.tex'), targetBody: 'BODY\n' });
    expect(result).toBe('!!!>include_target\n');
  });

  it('should reject a component that includes the wrapper', async () => {
    await setup({
      'wrapper.tex': '!!!>include(loop.tex)\n',
      'loop.tex': '!!!>include(wrapper.tex)\n',
    });

    await expect(
      composeWrapper({ ...context, wrapperPath: path.join(root, 'wrapper.tex'), targetBody: '' })
    ).rejects.toThrow(CircularIncludeError);
  });
});

describe('composeTarget', () => {
  let root: string;
  let context: ComposeContext;

  const project = (overrides: Partial<ProjectConfig> = {}): ProjectConfig => ({
    handle: 'book',
    name: 'Book',
    projectFolder: root,
    componentsFolder: root,
    buildFolder: path.join(root, 'build'),
    rootComponent: 'root.tex',
    wrapper: 'wrapper.tex',
    composeTargets: { chap2: 'methods.tex', introX: '7_intro.tex', notes: 'notes.tex' },
    exclude: [],
    compiler: { command: 'pdflatex', extraArgs: [] },
    ...overrides,
  });

  beforeEach(async () => {
    root = await makeTempDir();
    await writeTree(root, {
      'wrapper.tex': '\\documentclass{book}\n!!!>target_preamble\n\\begin{document}\n!!!>include_target\n\\end{document}\n',
      'chapters/methods.tex': '\\chapter{Methods}\n!!!>include(m1.tex)\n',
      'chapters/m1.tex': 'M1\n',
      'chapters/7_intro.tex': '\\chapter{Intro}\n',
      'notes.tex': 'Notes\n',
    });
    context = { componentsRoot: root, index: buildFileIndex(root) };
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('should number a chapN target and continue its pages', async () => {
    const result = await composeTarget(project(), 'chap2', context, new Map([[1, 1], [2, 15]]));

    expect(result).toBe(
      '\\documentclass{book}\n' +
      '\\setcounter{chapter}{1}\n\\setcounter{page}{15}\n' +
      '\\begin{document}\n\\chapter{Methods}\nM1\n\\end{document}\n'
    );
  });

  it('should number from the filename prefix without a page when none is known', async () => {
    const result = await composeTarget(project(), 'introX', context, new Map());

    expect(result).toBe(
      '\\documentclass{book}\n\\setcounter{chapter}{6}\n\\begin{document}\n\\chapter{Intro}\n\\end{document}\n'
    );
  });

  it('should emit no numbering for an unnumbered target', async () => {
    const result = await composeTarget(project(), 'notes', context, new Map([[1, 1]]));

    expect(result).toBe('\\documentclass{book}\n\\begin{document}\nNotes\n\\end{document}\n');
  });

  it('should fail without a wrapper', async () => {
    await expect(composeTarget(project({ wrapper: undefined }), 'chap2', context, new Map())).rejects.toThrow(
      MissingConfigurationError
    );
  });

  it('should fail when the project has no targets', async () => {
    await expect(composeTarget(project({ composeTargets: {} }), 'chap2', context, new Map())).rejects.toThrow(
      "Project 'book' defines no compose targets"
    );
  });

  it('should list valid targets for an unknown target', async () => {
    await expect(composeTarget(project(), 'chap9', context, new Map())).rejects.toThrow(
      "Unknown target 'chap9' for project 'book'. Valid targets: chap2, introX, notes"
    );
  });

  it('should not treat inherited object keys as targets', () => {
    expect(() => resolveTarget(project(), 'toString', context)).toThrow(MissingConfigurationError);
  });

  it('should resolve the target component through the index', () => {
    expect(resolveTarget(project(), 'chap2', context)).toEqual({
      name: 'chap2',
      ref: 'methods.tex',
      path: path.join(root, 'chapters', 'methods.tex'),
      chapter: 2,
    });
  });
});
