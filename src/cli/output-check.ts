import type { FileError, Finding, LintResult } from "../types.js";
import { colors } from "./output.js";

interface JsonFinding {
  file: string;
  line: number;
  column: number;
  end_line: number;
  end_column: number;
  rule: string;
  message: string;
  snippet: string;
  lines?: number;
  sub_findings: JsonFinding[];
}

interface JsonOutput {
  findings: JsonFinding[];
  errors: FileError[];
  summary: { files_checked: number; findings_count: number };
}

function toJsonFinding(f: Finding): JsonFinding {
  const json: JsonFinding = {
    file: f.file,
    line: f.range.start.line,
    column: f.range.start.column,
    end_line: f.range.end.line,
    end_column: f.range.end.column,
    rule: f.rule,
    message: f.message,
    snippet: f.snippet,
    sub_findings: f.subFindings.map(toJsonFinding),
  };
  if (f.lines !== undefined) {
    json.lines = f.lines;
  }
  return json;
}

export function buildJsonOutput(result: LintResult): JsonOutput {
  return {
    findings: result.findings.map(toJsonFinding),
    errors: result.fileErrors,
    summary: {
      files_checked: result.files.length,
      findings_count: result.findings.length,
    },
  };
}

/** `path:line:col message `snippet`` */
export function formatFinding(f: Finding): string {
  const location = colors.cyan(
    `${f.file}:${f.range.start.line}:${f.range.start.column}`,
  );
  return `${location} ${f.message} \`${f.snippet}\``;
}

export function formatReport(result: LintResult): string[] {
  const lines: string[] = [];

  for (const finding of result.findings) {
    lines.push(formatFinding(finding));
    finding.subFindings.forEach((sub, i) => {
      lines.push(`  ${colors.dim(`${i + 1})`)} ${formatFinding(sub)}`);
    });
  }

  for (const error of result.fileErrors) {
    lines.push(
      colors.yellow(`⚠ ${error.file} not fully checked: ${error.message}`),
    );
  }

  const fileCount = result.files.length;
  const checked = `${fileCount} file${fileCount === 1 ? "" : "s"} checked`;
  if (result.findings.length === 0) {
    lines.push(colors.green(`✓ No findings (${checked})`));
  } else {
    const s = result.findings.length === 1 ? "" : "s";
    lines.push(
      colors.red(`\n✗ ${result.findings.length} finding${s} (${checked})`),
    );
  }

  return lines;
}

export function outputResults(
  result: LintResult,
  json: boolean,
  quiet: boolean,
): void {
  if (json) {
    console.log(JSON.stringify(buildJsonOutput(result), null, 2));
    return;
  }

  if (quiet) {
    return;
  }

  for (const line of formatReport(result)) {
    console.log(line);
  }
}
