/**
 * Logical line counting for C function bodies.
 *
 * Every statement kind has its own cost rule; each non-zero cost is kept as
 * a contribution so the score of a function can be audited line by line.
 */

import { DEBUG_MACRO } from "../preprocessor/index.js";
import {
  lineSpan,
  spanRange,
  type SyntaxNode,
  type SyntaxTree,
  toRange,
} from "../parser/index.js";
import type { Finding, Range } from "../types.js";
import { createFinding, pluralize } from "./finding.js";

export const MAX_FUNCTION_LINES = 10;

const STATEMENT_KINDS = [
  "declaration",
  "expression_statement",
  "if_statement",
  "else_clause",
  "while_statement",
  "do_statement",
  "for_statement",
  "switch_statement",
  "case_statement",
  "break_statement",
  "continue_statement",
  "return_statement",
  "compound_statement",
  "preproc_ifdef",
  "preproc_else",
] as const;

export type StatementKind = (typeof STATEMENT_KINDS)[number];

const statementKinds: ReadonlySet<string> = new Set(STATEMENT_KINDS);

function isStatementKind(type: string): type is StatementKind {
  return statementKinds.has(type);
}

export interface FunctionCount {
  score: number;
  contributions: Finding[];
}

function assertNever(kind: never): never {
  throw new Error(`Unhandled statement kind: ${String(kind)}`);
}

/** Named children other than comments. */
function statements(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((child) => child.type !== "comment");
}

class ComplexityCounter {
  readonly contributions: Finding[] = [];

  constructor(
    private readonly file: string,
    private readonly text: string,
  ) {}

  count(node: SyntaxNode): number {
    const kind = node.type;
    if (!isStatementKind(kind)) {
      return 0;
    }

    switch (kind) {
      case "declaration":
        return this.countDeclaration(node);
      case "expression_statement":
        return this.countExpression(node);
      case "if_statement":
        return this.countIf(node);
      case "while_statement":
        return (
          this.countCondition(node, "while condition") +
          this.count(this.field(node, "body"))
        );
      case "do_statement":
        return (
          this.count(this.field(node, "body")) +
          this.countCondition(node, "do/while condition")
        );
      case "for_statement":
        return this.countFor(node);
      case "switch_statement":
        return (
          this.countCondition(node, "switch expression") +
          this.count(this.field(node, "body"))
        );
      case "case_statement":
        return this.countCaseBody(statements(node));
      case "break_statement":
        return this.record(toRange(node), "break statement", 1);
      case "continue_statement":
        return this.record(toRange(node), "continue statement", 1);
      case "return_statement":
        return this.countReturn(node);
      case "else_clause":
      case "compound_statement":
      case "preproc_else":
        return this.countAll(statements(node));
      case "preproc_ifdef":
        return this.countIfdef(node);
      default:
        return assertNever(kind);
    }
  }

  private field(node: SyntaxNode, name: string): SyntaxNode {
    const child = node.childForFieldName(name);
    if (!child) {
      throw new Error(
        `${node.type} without ${name} at line ${node.startPosition.row + 1}`,
      );
    }
    return child;
  }

  private countAll(nodes: SyntaxNode[]): number {
    return nodes.reduce((sum, node) => sum + this.count(node), 0);
  }

  private record(range: Range, reason: string, lines: number): number {
    this.contributions.push(
      createFinding({
        file: this.file,
        text: this.text,
        range,
        rule: "function-length/contribution",
        message: `Counted ${reason} for ${pluralize(lines, "line")}`,
        lines,
      }),
    );
    return lines;
  }

  private countSpan(node: SyntaxNode | null, reason: string): number {
    if (!node) return 0;
    const range = toRange(node);
    return this.record(range, reason, lineSpan(range));
  }

  private countCondition(node: SyntaxNode, reason: string): number {
    return this.countSpan(node.childForFieldName("condition"), reason);
  }

  // Spans the initializer values; the declared names do not count
  private countDeclaration(node: SyntaxNode): number {
    const values = node.namedChildren
      .filter((child) => child.type === "init_declarator")
      .map((declarator) => declarator.childForFieldName("value"))
      .filter((value): value is SyntaxNode => value !== null);
    const first = values[0];
    const last = values[values.length - 1];
    if (!first || !last) return 0;

    const range = spanRange(first, last);
    return this.record(range, "definition", lineSpan(range));
  }

  private countExpression(node: SyntaxNode): number {
    const [expression] = statements(node);
    return expression ? this.countSpan(expression, "expression") : 0;
  }

  private countIf(node: SyntaxNode): number {
    const alternative = node.childForFieldName("alternative");
    return (
      this.countCondition(node, "if condition") +
      this.count(this.field(node, "consequence")) +
      (alternative ? this.count(alternative) : 0)
    );
  }

  // The clause header runs from the `for` keyword to its closing parenthesis
  private countFor(node: SyntaxNode): number {
    const body = this.field(node, "body");
    const keyword = node.child(0);
    const closing = node.children.filter(
      (child) => child.type === ")" && child.endIndex <= body.startIndex,
    );
    const close = closing[closing.length - 1];
    if (!keyword || !close) {
      throw new Error(
        `Malformed for statement at line ${node.startPosition.row + 1}`,
      );
    }

    const range = spanRange(keyword, close);
    return (
      this.record(range, "for condition", lineSpan(range)) + this.count(body)
    );
  }

  /**
   * A trailing `break` of a case is not counted; when the case ends in a
   * block, the rule applies to that block's last statement.
   */
  private countCaseBody(nodes: SyntaxNode[]): number {
    const last = nodes[nodes.length - 1];
    if (!last) return 0;

    const leading = this.countAll(nodes.slice(0, -1));
    if (last.type === "break_statement") return leading;
    if (last.type === "compound_statement") {
      return leading + this.countCaseBody(statements(last));
    }
    return leading + this.count(last);
  }

  private countReturn(node: SyntaxNode): number {
    const [value] = statements(node);
    return value ? this.record(toRange(value), "return statement", 1) : 0;
  }

  // Blocks guarded by DEBUG are debug-only, whichever directive opens them
  private countIfdef(node: SyntaxNode): number {
    const name = this.field(node, "name");
    if (name.text === DEBUG_MACRO) {
      return 0;
    }

    const alternative = node.childForFieldName("alternative");
    const body = statements(node).filter(
      (child) =>
        child.startIndex !== name.startIndex &&
        child.startIndex !== alternative?.startIndex,
    );
    return this.countAll(body) + (alternative ? this.count(alternative) : 0);
  }
}

/**
 * Score a function body.
 * @param body the `compound_statement` of a function definition
 * @param text the text the tree was parsed from, used for snippets
 */
export function countFunctionBody(
  body: SyntaxNode,
  file: string,
  text: string,
): FunctionCount {
  const counter = new ComplexityCounter(file, text);
  const score = counter.count(body);
  return { score, contributions: counter.contributions };
}

/**
 * Flag every top-level function whose score exceeds MAX_FUNCTION_LINES.
 */
export function checkFunctionComplexity(
  tree: SyntaxTree,
  file: string,
  text: string,
): Finding[] {
  const findings: Finding[] = [];

  for (const node of tree.rootNode.namedChildren) {
    if (node.type !== "function_definition") continue;

    const body = node.childForFieldName("body");
    const declarator = node.childForFieldName("declarator");
    if (!body || !declarator) continue;

    const { score, contributions } = countFunctionBody(body, file, text);
    if (score > MAX_FUNCTION_LINES) {
      findings.push(
        createFinding({
          file,
          text,
          range: toRange(declarator),
          rule: "function-length",
          message: `Function has more than ${MAX_FUNCTION_LINES} lines (${score})`,
          subFindings: contributions,
        }),
      );
    }
  }

  return findings;
}
