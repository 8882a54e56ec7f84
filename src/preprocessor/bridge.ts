/**
 * Bridge to an external C preprocessor (cpp by default).
 */

import { runFilterCommand } from "./command.js";
import {
  type ExpandOptions,
  type Preprocessor,
  type PreprocessorSettings,
} from "./types.js";

export const DEFAULT_PREPROCESSOR: PreprocessorSettings = {
  command: "cpp",
  args: [],
  timeoutMs: 30_000,
};

export const DEBUG_MACRO = "DEBUG";

/**
 * Arguments for one expansion. The source arrives on stdin, so quoted
 * includes are found through `-I` rather than the file's own location.
 */
export function buildArgs(
  settings: PreprocessorSettings,
  options: ExpandOptions,
): string[] {
  const args = [...settings.args, "-I", options.cwd];
  if (options.debug) {
    args.push(`-D${DEBUG_MACRO}`);
  }
  return args;
}

export class CommandPreprocessor implements Preprocessor {
  private readonly settings: PreprocessorSettings;

  constructor(settings: Partial<PreprocessorSettings> = {}) {
    this.settings = { ...DEFAULT_PREPROCESSOR, ...settings };
  }

  /**
   * Macro-expand `source`. The output keeps the preprocessor's line markers.
   * @throws PreprocessError
   */
  expand(source: string, options: ExpandOptions): Promise<string> {
    return runFilterCommand(
      this.settings.command,
      buildArgs(this.settings, options),
      {
        cwd: options.cwd,
        input: source,
        timeoutMs: this.settings.timeoutMs,
      },
    );
  }
}
