// Preprocessor configuration - how C sources are macro-expanded
export interface PreprocessorConfig {
  command?: string;
  args?: string[];
  timeout_ms?: number;
}

// Files configuration - discovered files matching these patterns are skipped
export interface FilesConfig {
  exclude?: string[];
}

export interface Config {
  preprocessor?: PreprocessorConfig;
  files?: FilesConfig;
}

export interface Position {
  line: number;
  column: number;
}

/**
 * A span of text. Lines and columns are 1-based; indices are offsets into
 * the exact text the range was computed against.
 */
export interface Range {
  start: Position;
  end: Position;
  startIndex: number;
  endIndex: number;
}

export type FindingRule =
  | "global-variable"
  | "missing-comment"
  | "function-length"
  | "function-length/contribution"
  | "macro-case"
  | "identifier-case";

export interface Finding {
  file: string;
  range: Range;
  rule: FindingRule;
  message: string;
  // Source line (or identifier text) shown next to the message
  snippet: string;
  // Logical lines a complexity contribution stands for
  lines?: number;
  subFindings: Finding[];
}

export type IdentifierCase = "lower-snake" | "camel";

export interface Identifier {
  file: string;
  range: Range;
  case: IdentifierCase;
  text: string;
}

// A file that could not be fully checked; its other findings are still reported
export interface FileError {
  file: string;
  message: string;
}

export interface LintResult {
  findings: Finding[];
  files: string[];
  fileErrors: FileError[];
}

export const ExitCode = {
  SUCCESS: 0, // No findings
  VIOLATIONS: 1, // Findings reported
  CONFIG_ERROR: 2, // Invalid cslint.toml
  RUNTIME_ERROR: 3, // Unreadable file, include cycle, preprocessor failure
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];
