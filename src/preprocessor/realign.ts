/**
 * Line-marker realignment.
 *
 * Preprocessor output interleaves expanded text with markers of the form
 * `# <line> "<path>" [flags]`. Realignment keeps the text attributed to the
 * piped-in file and puts every kept line back on its original line number,
 * so ranges computed on the result are valid against the original file.
 */

import { type LineMarker, MalformedDirectiveError } from "./types.js";

// Name the preprocessor gives to a file read from standard input
export const STDIN_NAME = "<stdin>";

const MARKER_START = /^#\s*(?:line\s+)?\d/;
const MARKER = /^#\s*(?:line\s+)?(\d+)\s+"((?:[^"\\]|\\.)*)"((?:\s+\d+)*)\s*$/;

/**
 * Parse a line marker. Returns null for ordinary lines.
 * @throws MalformedDirectiveError for a line that starts like a marker but
 *   does not follow the format
 */
export function parseLineMarker(line: string): LineMarker | null {
  if (!MARKER_START.test(line)) {
    return null;
  }

  const match = MARKER.exec(line.trimEnd());
  if (!match) {
    throw new MalformedDirectiveError(line);
  }

  const [, lineNum = "", rawPath = "", rawFlags = ""] = match;
  return {
    line: parseInt(lineNum, 10),
    path: rawPath.replace(/\\(.)/g, "$1"),
    flags: rawFlags
      .trim()
      .split(/\s+/)
      .filter((f) => f !== "")
      .map((f) => parseInt(f, 10)),
  };
}

/**
 * Rebuild the text of the file named `stdinName` from preprocessor output.
 * Segments from other files and the line-0 prologue are dropped; skipped
 * lines are padded with blank lines. Malformed markers are ignored and the
 * text after them stays with the current segment.
 */
export function realign(rawOutput: string, stdinName = STDIN_NAME): string {
  const lines: string[] = [];
  let keeping = false;
  // Line count the output must reach before the next kept line
  let padTo = 0;

  const body = rawOutput.endsWith("\n") ? rawOutput.slice(0, -1) : rawOutput;
  if (body === "") return "";

  for (const line of body.split("\n")) {
    let marker: LineMarker | null;
    try {
      marker = parseLineMarker(line);
    } catch (error) {
      if (error instanceof MalformedDirectiveError) continue;
      throw error;
    }

    if (marker) {
      keeping = marker.path === stdinName && marker.line > 0;
      padTo = keeping ? marker.line - 1 : 0;
      continue;
    }

    if (keeping) {
      while (lines.length < padTo) {
        lines.push("");
      }
      padTo = 0;
      lines.push(line);
    }
  }

  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}
