/**
 * Identifier naming checks: macro casing and project-wide consistency of
 * snake_case versus camelCase identifiers.
 */

import Parser from "tree-sitter";

import {
  language,
  type SyntaxTree,
  toRange,
} from "../parser/index.js";
import type { Finding, Identifier, IdentifierCase } from "../types.js";
import { createFinding } from "./finding.js";

const IDENTIFIER_QUERY = `
(declaration declarator: (identifier) @identifier)
(declaration declarator: (init_declarator declarator: (identifier) @identifier))
(parameter_list (parameter_declaration declarator: (identifier) @identifier))
(preproc_def) @macro
(preproc_function_def) @macro
`;

const query = new Parser.Query(language, IDENTIFIER_QUERY);

const SCREAMING_SNAKE_CASE = /^[A-Z0-9_]+$/;
const LOWER_SNAKE_CASE = /^[a-z0-9_]+_[a-z0-9_]+$/;
const CAMEL_CASE = /^[a-z]+(?:[A-Z][a-z0-9]*)+$/;

export interface ClassifyResult {
  findings: Finding[];
  identifiers: Identifier[];
}

/** Case style of an identifier, or null when it is neither style. */
export function classifyCase(text: string): IdentifierCase | null {
  if (LOWER_SNAKE_CASE.test(text)) return "lower-snake";
  if (CAMEL_CASE.test(text)) return "camel";
  return null;
}

export function classifyIdentifiers(
  tree: SyntaxTree,
  file: string,
  text: string,
): ClassifyResult {
  const findings: Finding[] = [];
  const identifiers: Identifier[] = [];

  for (const capture of query.captures(tree.rootNode)) {
    if (capture.name === "macro") {
      const name = capture.node.childForFieldName("name");
      if (name && !SCREAMING_SNAKE_CASE.test(name.text)) {
        findings.push(
          createFinding({
            file,
            text,
            range: toRange(name),
            rule: "macro-case",
            message: "Macro is not SCREAMING_SNAKE_CASE",
          }),
        );
      }
      continue;
    }

    const identifierCase = classifyCase(capture.node.text);
    if (identifierCase) {
      identifiers.push({
        file,
        range: toRange(capture.node),
        case: identifierCase,
        text: capture.node.text,
      });
    }
  }

  return { findings, identifiers };
}

const CASE_MESSAGES: Record<IdentifierCase, string> = {
  "lower-snake": "Snake case identifier contributes to case inconsistency",
  camel: "Camel case identifier contributes to case inconsistency",
};

/**
 * One finding per classified identifier, but only when both styles occur
 * somewhere in the linted files.
 */
export function checkCaseConsistency(identifiers: Identifier[]): Finding[] {
  const styles = new Set(identifiers.map((identifier) => identifier.case));
  if (styles.size < 2) {
    return [];
  }

  return identifiers.map((identifier) => ({
    file: identifier.file,
    range: identifier.range,
    rule: "identifier-case" as const,
    message: CASE_MESSAGES[identifier.case],
    snippet: identifier.text,
    subFindings: [],
  }));
}
