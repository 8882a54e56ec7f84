/**
 * Type definitions for the preprocessor module.
 */

// Error thrown when the external preprocessor cannot produce output
export class PreprocessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreprocessError";
  }
}

// Error thrown for a line that looks like a line marker but cannot be read
export class MalformedDirectiveError extends Error {
  readonly directive: string;
  constructor(directive: string) {
    super(`Malformed line marker: ${directive}`);
    this.name = "MalformedDirectiveError";
    this.directive = directive;
  }
}

export interface ExpandOptions {
  /** Predefine DEBUG (debug build pass) */
  debug: boolean;
  /** Directory quoted includes are resolved against */
  cwd: string;
}

export interface Preprocessor {
  expand(source: string, options: ExpandOptions): Promise<string>;
}

export interface PreprocessorSettings {
  command: string;
  args: string[];
  timeoutMs: number;
}

/** `# <line> "<path>" [flags]` */
export interface LineMarker {
  line: number;
  path: string;
  flags: number[];
}
