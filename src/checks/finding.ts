import { lineAt } from "../parser/index.js";
import type { Finding, FindingRule, Range } from "../types.js";

interface FindingInput {
  file: string;
  text: string;
  range: Range;
  rule: FindingRule;
  message: string;
  lines?: number;
  subFindings?: Finding[];
}

/** Build a finding whose snippet is the source line the range starts on. */
export function createFinding(input: FindingInput): Finding {
  const finding: Finding = {
    file: input.file,
    range: input.range,
    rule: input.rule,
    message: input.message,
    snippet: lineAt(input.text, input.range.start.line),
    subFindings: input.subFindings ?? [],
  };
  if (input.lines !== undefined) {
    finding.lines = input.lines;
  }
  return finding;
}

export function pluralize(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}
