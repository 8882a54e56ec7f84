/**
 * Lint aggregation - runs every check over the files of the given
 * translation units and merges the findings.
 */

import { stat } from "fs/promises";
import { glob } from "glob";
import { minimatch } from "minimatch";
import { dirname, relative, resolve } from "path";

import {
  checkCaseConsistency,
  checkFunctionComments,
  checkFunctionComplexity,
  checkGlobalVariables,
  classifyIdentifiers,
} from "./checks/index.js";
import { readSource, resolveIncludes } from "./includes/index.js";
import { ParseError, parseC } from "./parser/index.js";
import {
  CommandPreprocessor,
  PreprocessError,
  type Preprocessor,
  realign,
} from "./preprocessor/index.js";
import type {
  FileError,
  Finding,
  Identifier,
  LintResult,
} from "./types.js";

export interface LintOptions {
  /** Directory findings are reported relative to and excludes match against */
  projectRoot?: string;
  /** minimatch patterns of files to skip */
  exclude?: string[];
  preprocessor?: Preprocessor;
}

interface FileLint {
  findings: Finding[];
  identifiers: Identifier[];
  errors: FileError[];
}

const SOURCE_PATTERN = "**/*.{c,h}";
const IGNORED_DIRECTORIES = ["**/node_modules/**", "**/.git/**", "**/build/**"];

/**
 * Turn CLI paths into root files: directories contribute every C source
 * and header below them, anything else is taken as a file.
 */
export async function expandPaths(paths: string[]): Promise<string[]> {
  const roots: string[] = [];

  for (const path of paths) {
    const absolute = resolve(path);
    const stats = await stat(absolute).catch(() => null);
    if (stats?.isDirectory()) {
      const found = await glob(SOURCE_PATTERN, {
        cwd: absolute,
        absolute: true,
        nodir: true,
        ignore: IGNORED_DIRECTORIES,
      });
      roots.push(...found.sort());
    } else {
      roots.push(absolute);
    }
  }

  return roots;
}

/**
 * Merge the include closures of all roots into one sorted file list.
 * @throws ReadError, ParseError, CircularIncludeError
 */
export async function collectFiles(
  roots: string[],
  projectRoot: string,
  exclude: string[] = [],
): Promise<string[]> {
  const files = new Set<string>();
  for (const root of roots) {
    for (const file of await resolveIncludes(root)) {
      files.add(file);
    }
  }

  return [...files]
    .filter((file) => {
      const relPath = relative(projectRoot, file);
      return !exclude.some((pattern) => minimatch(relPath, pattern));
    })
    .sort(comparePaths);
}

function displayPath(file: string, projectRoot: string): string {
  return relative(projectRoot, file) || file;
}

/**
 * Complexity of the functions the file itself defines, measured on its
 * release-build expansion with included content dropped.
 */
async function checkExpandedComplexity(
  file: string,
  path: string,
  source: string,
  preprocessor: Preprocessor,
): Promise<Finding[]> {
  const expanded = await preprocessor.expand(source, {
    debug: false,
    cwd: dirname(file),
  });
  const virtualText = realign(expanded);
  const tree = parseC(virtualText, path);
  return checkFunctionComplexity(tree, path, virtualText);
}

/** Checks that run on the file as written. */
function checkSource(path: string, source: string): FileLint {
  const tree = parseC(source, path);
  const classified = classifyIdentifiers(tree, path, source);
  return {
    findings: [
      ...checkGlobalVariables(tree, path, source),
      ...checkFunctionComments(tree, path, source),
      ...classified.findings,
    ],
    identifiers: classified.identifiers,
    errors: [],
  };
}

function isFileError(error: unknown): error is PreprocessError | ParseError {
  return error instanceof PreprocessError || error instanceof ParseError;
}

async function lintFile(
  file: string,
  projectRoot: string,
  preprocessor: Preprocessor,
): Promise<FileLint> {
  const path = displayPath(file, projectRoot);
  const source = await readSource(file);

  let lint: FileLint;
  try {
    lint = checkSource(path, source);
  } catch (error) {
    if (!isFileError(error)) throw error;
    lint = {
      findings: [],
      identifiers: [],
      errors: [{ file: path, message: error.message }],
    };
  }

  try {
    lint.findings.push(
      ...(await checkExpandedComplexity(file, path, source, preprocessor)),
    );
  } catch (error) {
    if (!isFileError(error)) throw error;
    lint.errors.push({ file: path, message: error.message });
  }

  return lint;
}

/** Code-unit order, so findings and the file list sort alike. */
function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareFindings(a: Finding, b: Finding): number {
  if (a.file !== b.file) return comparePaths(a.file, b.file);
  if (a.range.start.line !== b.range.start.line) {
    return a.range.start.line - b.range.start.line;
  }
  return a.range.start.column - b.range.start.column;
}

/**
 * Lint the translation units rooted at `paths`.
 * Unreadable files and include cycles abort the run; preprocessor and parse
 * failures of a single file are returned in `fileErrors`.
 */
export async function lintFiles(
  paths: string[],
  options: LintOptions = {},
): Promise<LintResult> {
  const projectRoot = resolve(options.projectRoot ?? process.cwd());
  const preprocessor = options.preprocessor ?? new CommandPreprocessor();

  const roots = await expandPaths(paths);
  const files = await collectFiles(roots, projectRoot, options.exclude);

  const results = await Promise.all(
    files.map((file) => lintFile(file, projectRoot, preprocessor)),
  );

  const findings = results.flatMap((r) => r.findings);
  findings.push(...checkCaseConsistency(results.flatMap((r) => r.identifiers)));

  const fileErrors = results.flatMap((r) => r.errors);

  return {
    findings: findings.sort(compareFindings),
    files: files.map((file) => displayPath(file, projectRoot)),
    fileErrors,
  };
}
