/**
 * C parsing on top of tree-sitter.
 */

import Parser from "tree-sitter";
import C from "tree-sitter-c";

import type { Range } from "../types.js";

export type SyntaxNode = Parser.SyntaxNode;
export type SyntaxTree = Parser.Tree;

// Error thrown when a text cannot be turned into a clean syntax tree
export class ParseError extends Error {
  readonly file: string;
  constructor(file: string, message: string) {
    super(`Failed to parse ${file}: ${message}`);
    this.name = "ParseError";
    this.file = file;
  }
}

const parser = new Parser();
parser.setLanguage(C);

export const language = C;

/**
 * Parse C source text into a tree that may contain ERROR nodes.
 * @throws ParseError only when the parser itself fails
 */
export function parseSource(text: string, file: string): SyntaxTree {
  try {
    // The default input buffer is too small for large sources
    return parser.parse(text, undefined, {
      bufferSize: Math.max(32 * 1024, text.length * 2 + 1),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(file, message);
  }
}

/**
 * Parse C source text. Trees containing ERROR nodes are rejected so that
 * checks never run on a partial structure.
 */
export function parseC(text: string, file: string): SyntaxTree {
  const tree = parseSource(text, file);

  const [firstError] = tree.rootNode.descendantsOfType("ERROR");
  if (firstError) {
    throw new ParseError(
      file,
      `syntax error at line ${firstError.startPosition.row + 1}`,
    );
  }
  return tree;
}

export function toRange(node: SyntaxNode): Range {
  return spanRange(node, node);
}

/** Range running from the start of `first` to the end of `last`. */
export function spanRange(first: SyntaxNode, last: SyntaxNode): Range {
  return {
    start: {
      line: first.startPosition.row + 1,
      column: first.startPosition.column + 1,
    },
    end: {
      line: last.endPosition.row + 1,
      column: last.endPosition.column + 1,
    },
    startIndex: first.startIndex,
    endIndex: last.endIndex,
  };
}

/** Number of lines a range touches. */
export function lineSpan(range: Range): number {
  return range.end.line - range.start.line + 1;
}

/** Text of a 1-based line, or "" past the end. */
export function lineAt(text: string, line: number): string {
  return text.split("\n")[line - 1]?.replace(/\r$/, "") ?? "";
}
