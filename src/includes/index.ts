/**
 * Include resolution - discovers every locally-authored file a translation
 * unit pulls in through quoted `#include` directives.
 */

import { readFile } from "fs/promises";
import { dirname, join, resolve } from "path";

import { parseSource, type SyntaxNode } from "../parser/index.js";

// Error thrown when a file of the translation unit cannot be read
export class ReadError extends Error {
  readonly file: string;
  constructor(file: string, message: string) {
    super(`Failed to read ${file}: ${message}`);
    this.name = "ReadError";
    this.file = file;
  }
}

export class CircularIncludeError extends Error {
  readonly chain: string[];
  constructor(chain: string[]) {
    super(`Circular include: ${chain.join(" -> ")}`);
    this.name = "CircularIncludeError";
    this.chain = chain;
  }
}

export type FileSet = Set<string>;

// Nodes whose children are still top-level for include purposes: header
// guards wrap a whole file in a conditional, and error recovery can wrap
// directives in an ERROR node
const NESTING_KINDS = new Set([
  "ERROR",
  "preproc_if",
  "preproc_ifdef",
  "preproc_else",
  "preproc_elif",
  "preproc_elifdef",
]);

export async function readSource(file: string): Promise<string> {
  try {
    return await readFile(file, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ReadError(file, message);
  }
}

/**
 * Quoted include paths of a parsed file, in source order. Angle-bracket
 * (system) includes are ignored.
 */
export function findLocalIncludes(root: SyntaxNode): string[] {
  const paths: string[] = [];

  const scan = (node: SyntaxNode): void => {
    for (const child of node.namedChildren) {
      if (child.type === "preproc_include") {
        const pathNode = child.childForFieldName("path");
        if (pathNode?.type === "string_literal") {
          paths.push(pathNode.text.slice(1, -1));
        }
      } else if (NESTING_KINDS.has(child.type)) {
        scan(child);
      }
    }
  };

  scan(root);
  return paths;
}

/**
 * Resolve the file set of the translation unit rooted at `rootPath`.
 * Include paths are resolved against the including file's directory.
 * @throws ReadError, ParseError, CircularIncludeError
 */
export async function resolveIncludes(rootPath: string): Promise<FileSet> {
  const fileSet: FileSet = new Set();
  await visit(resolve(rootPath), [], fileSet);
  return fileSet;
}

async function visit(
  file: string,
  chain: string[],
  fileSet: FileSet,
): Promise<void> {
  fileSet.add(file);
  const source = await readSource(file);
  // Syntax errors elsewhere in the file do not hide its includes
  const tree = parseSource(source, file);
  const current = [...chain, file];

  for (const includePath of findLocalIncludes(tree.rootNode)) {
    const target = join(dirname(file), includePath);
    if (current.includes(target)) {
      throw new CircularIncludeError([...current, target]);
    }
    if (!fileSet.has(target)) {
      await visit(target, current, fileSet);
    }
  }
}
