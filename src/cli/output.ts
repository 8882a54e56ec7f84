/**
 * Colored terminal output.
 *
 * Colors are disabled when stdout is not a TTY or NO_COLOR is set;
 * FORCE_COLOR turns them on regardless (https://no-color.org/).
 */

const CODES = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  dim: "\x1b[90m",
  reset: "\x1b[0m",
} as const;

type ColorName = Exclude<keyof typeof CODES, "reset">;

export function colorsEnabled(): boolean {
  if (process.env.FORCE_COLOR !== undefined && process.env.FORCE_COLOR !== "") {
    return true;
  }
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  return process.stdout.isTTY === true;
}

function colorFn(name: ColorName): (text: string) => string {
  return (text: string): string =>
    colorsEnabled() ? `${CODES[name]}${text}${CODES.reset}` : text;
}

export const colors = {
  /** Findings, fatal errors */
  red: colorFn("red"),
  /** Clean runs */
  green: colorFn("green"),
  /** Per-file errors */
  yellow: colorFn("yellow"),
  /** file:line:col locations */
  cyan: colorFn("cyan"),
  /** Sub-finding indices, snippets */
  dim: colorFn("dim"),
} satisfies Record<ColorName, (text: string) => string>;
