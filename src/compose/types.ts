/**
 * Type definitions for the component composition module
 */

/**
 * Bare filename -> absolute path for every component under a root
 */
export type FileIndex = Map<string, string>;

/**
 * Chapter number -> first page, recovered from a compiler .aux file
 */
export type ChapterPageMap = Map<number, number>;

/**
 * One classified source line.
 *
 * `raw` always holds the original line including its terminator, so a
 * line that is not acted on can be emitted unchanged.
 */
export type ComponentLine =
  | { kind: 'text'; raw: string }
  | { kind: 'include'; raw: string; ref: string }
  | { kind: 'target'; raw: string }
  | { kind: 'preamble'; raw: string };

/**
 * Which directives a reader honours.
 *
 * Components only know `include`; the wrapper template also knows the
 * two target sentinels.
 */
export type DirectiveGrammar = 'component' | 'wrapper';

/**
 * Options shared by every composition entry point
 */
export interface ComposeContext {
  /** Root folder component references resolve against */
  componentsRoot: string;
  /** Filename index; when omitted, bare references join the root directly */
  index?: FileIndex;
}

/**
 * External compiler settings for a project
 */
export interface CompilerSettings {
  /** Executable name or path (default: pdflatex) */
  command: string;
  /** Extra arguments placed before the source file */
  extraArgs: string[];
  /** Kill the compiler after this many milliseconds; unlimited when omitted */
  timeoutMs?: number;
}

/**
 * A composable project, as read from the workspace configuration
 */
export interface ProjectConfig {
  /** Key of the project in the workspace file */
  handle: string;
  /** Display name */
  name: string;
  projectFolder: string;
  componentsFolder: string;
  buildFolder: string;
  /** Reference (bare name or relative path) of the document root */
  rootComponent: string;
  /** Reference of the wrapper template used for target builds */
  wrapper?: string;
  /** Target name -> component reference */
  composeTargets: Record<string, string>;
  /** Glob patterns skipped when indexing components */
  exclude: string[];
  compiler: CompilerSettings;
}

/**
 * A target after resolution, ready to compose
 */
export interface ResolvedTarget {
  name: string;
  ref: string;
  path: string;
  /** Derived chapter number, if any */
  chapter?: number;
}

/**
 * Output of running an external command
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs an external command in a directory. Replaced in tests.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  cwd: string,
  timeout?: number
) => Promise<CommandResult>;

/**
 * How a build ended.
 *
 * `warnings` means the compiler exited non-zero but still wrote a PDF.
 */
export type BuildStatus = 'success' | 'warnings' | 'failed';

/**
 * Result of one compose cycle
 */
export interface BuildResult {
  status: BuildStatus;
  /** The generated .tex file, when composition got that far */
  texPath?: string;
  /** The PDF, when it exists */
  pdfPath?: string;
  /** Compiler exit code, when it ran */
  exitCode?: number;
  /** Combined compiler stdout/stderr */
  log: string;
  /** User-facing summary */
  message: string;
}

/**
 * A node of the include hierarchy
 */
export interface ComponentTreeNode {
  /** Reference as written in the parent, or the root's filename */
  name: string;
  path: string;
  children: ComponentTreeNode[];
}
