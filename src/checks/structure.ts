/**
 * Single-node checks on the top level of a translation unit.
 */

import { type SyntaxTree, toRange } from "../parser/index.js";
import type { Finding } from "../types.js";
import { createFinding } from "./finding.js";

// Declarators that introduce a variable (prototypes use function_declarator)
const VARIABLE_DECLARATORS = new Set(["identifier", "init_declarator"]);

/** Top-level variable declarations are not allowed. */
export function checkGlobalVariables(
  tree: SyntaxTree,
  file: string,
  text: string,
): Finding[] {
  const findings: Finding[] = [];

  for (const node of tree.rootNode.namedChildren) {
    if (node.type !== "declaration") continue;

    const declarator = node.childForFieldName("declarator");
    if (declarator && VARIABLE_DECLARATORS.has(declarator.type)) {
      findings.push(
        createFinding({
          file,
          text,
          range: toRange(node),
          rule: "global-variable",
          message: "Global variable",
        }),
      );
    }
  }

  return findings;
}

/** Every function needs a comment ending on the line right above it. */
export function checkFunctionComments(
  tree: SyntaxTree,
  file: string,
  text: string,
): Finding[] {
  const findings: Finding[] = [];

  for (const node of tree.rootNode.namedChildren) {
    if (node.type !== "function_definition") continue;

    const previous = node.previousSibling;
    const documented =
      previous?.type === "comment" &&
      previous.endPosition.row === node.startPosition.row - 1;
    const declarator = node.childForFieldName("declarator");

    if (!documented && declarator) {
      findings.push(
        createFinding({
          file,
          text,
          range: toRange(declarator),
          rule: "missing-comment",
          message: "Missing comment directly above function",
        }),
      );
    }
  }

  return findings;
}
