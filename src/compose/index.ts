/**
 * Component Composition Module
 *
 * Assembles LaTeX documents from reusable components:
 * - Index components by filename and resolve include references
 * - Expand `!!!>include(...)` directives with per-branch cycle detection
 * - Splice one target into a shared wrapper for chapter builds
 * - Recover chapter start pages from the compiler's .aux file
 * - Compile and judge the build by the PDF it leaves
 */

export * from './types';
export * from './errors';
export * from './directives';
export * from './fileIndex';
export * from './includeResolver';
export * from './textComposer';
export * from './chapterNumbering';
export * from './wrapperComposer';
export * from './auxParser';
export * from './latexCompiler';
export * from './buildDriver';
export * from './componentTree';
