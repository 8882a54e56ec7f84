import { Command } from "commander";

import {
  ConfigError,
  findProjectRoot,
  loadConfig,
} from "../../config/loader.js";
import { lintFiles } from "../../linter.js";
import {
  CommandPreprocessor,
  type PreprocessorSettings,
} from "../../preprocessor/index.js";
import {
  type Config,
  ExitCode,
  type ExitCodeValue,
  type LintResult,
} from "../../types.js";
import { colors } from "../output.js";
import { outputResults } from "../output-check.js";

interface CheckOptions {
  json?: boolean;
  quiet?: boolean;
}

export const checkCommand = new Command("check")
  .description("Check C translation units for style and function complexity")
  .argument(
    "[paths...]",
    "C files or directories to check (default: current directory)",
  )
  .option("--json", "Output results as JSON", false)
  .option("-q, --quiet", "Suppress all output (exit code only)", false)
  .addHelpText(
    "after",
    `
Examples:
  $ cslint main.c                  Check main.c and the headers it includes
  $ cslint src/                    Check every .c and .h file under src/
  $ cslint a.c b.c --json          Output as JSON for CI/tooling
  $ cslint main.c --quiet          Silent mode (exit code only)`,
  )
  .action(async (paths: string[], options: CheckOptions) => {
    try {
      await executeCheck(paths, options);
    } catch (error: unknown) {
      handleCheckError(error, options.json ?? false, options.quiet ?? false);
    }
  });

/** Findings win over per-file errors; a clean run exits with SUCCESS. */
export function exitCodeFor(result: LintResult): ExitCodeValue {
  if (result.findings.length > 0) return ExitCode.VIOLATIONS;
  if (result.fileErrors.length > 0) return ExitCode.RUNTIME_ERROR;
  return ExitCode.SUCCESS;
}

function buildPreprocessor(config: Config): CommandPreprocessor {
  const settings: Partial<PreprocessorSettings> = {};
  const { command, args, timeout_ms } = config.preprocessor ?? {};
  if (command !== undefined) settings.command = command;
  if (args !== undefined) settings.args = args;
  if (timeout_ms !== undefined) settings.timeoutMs = timeout_ms;
  return new CommandPreprocessor(settings);
}

async function executeCheck(
  paths: string[],
  options: CheckOptions,
): Promise<void> {
  const json = options.json ?? false;
  const quiet = json || (options.quiet ?? false);

  const projectRoot = findProjectRoot();
  const config = await loadConfig(projectRoot);

  const result = await lintFiles(paths.length > 0 ? paths : ["."], {
    projectRoot,
    exclude: config.files?.exclude,
    preprocessor: buildPreprocessor(config),
  });

  outputResults(result, json, quiet);
  process.exit(exitCodeFor(result));
}

type ErrorCode = "CONFIG_ERROR" | "RUNTIME_ERROR";

function getErrorInfo(error: unknown): { code: ErrorCode; exitCode: number } {
  if (error instanceof ConfigError) {
    return { code: "CONFIG_ERROR", exitCode: ExitCode.CONFIG_ERROR };
  }
  // ReadError, ParseError and CircularIncludeError abort the whole run
  return { code: "RUNTIME_ERROR", exitCode: ExitCode.RUNTIME_ERROR };
}

function handleCheckError(
  error: unknown,
  json: boolean,
  quiet: boolean,
): never {
  const errorMessage = error instanceof Error ? error.message : "Unknown error";
  const { code: errorCode, exitCode } = getErrorInfo(error);

  // --json takes precedence over --quiet (JSON output is still useful for CI)
  if (json) {
    console.log(
      JSON.stringify(
        { error: { code: errorCode, message: errorMessage } },
        null,
        2,
      ),
    );
  } else if (!quiet) {
    console.error(colors.red(`Error: ${errorMessage}`));
  }
  process.exit(exitCode);
}
