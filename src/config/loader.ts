import { existsSync, statSync } from "fs";
import { readFile } from "fs/promises";
import { dirname, join, resolve } from "path";
import { z } from "zod";

import type { Config } from "../types.js";

export const CONFIG_FILENAME = "cslint.toml";

// Custom error class for configuration errors (exit code 2)
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const preprocessorSchema = z.object({
  command: z.string().min(1, "command cannot be empty").optional(),
  args: z.array(z.string()).optional(),
  timeout_ms: z.number().int().positive().optional(),
});

const filesSchema = z.object({
  exclude: z.array(z.string().min(1)).optional(),
});

// Full cslint.toml schema
export const configSchema = z
  .object({
    preprocessor: preprocessorSchema.optional(),
    files: filesSchema.optional(),
  })
  .strict();

// Strip Symbol keys from an object (recursively)
// @iarna/toml adds Symbol keys for metadata that interfere with Zod validation
export function stripSymbolKeys(obj: unknown): unknown {
  if (obj === null || typeof obj !== "object") {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(stripSymbolKeys);
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = stripSymbolKeys(value);
  }
  return result;
}

async function parseTomlFile(configPath: string): Promise<unknown> {
  const content = await readFile(configPath, "utf-8");
  const TOML = await import("@iarna/toml");

  try {
    return stripSymbolKeys(TOML.parse(content));
  } catch (error) {
    const message = error instanceof Error ? error.message : "Parse error";
    throw new ConfigError(`Invalid TOML: ${message}`);
  }
}

function formatZodErrors(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const pathStr = issue.path.map((p) => String(p)).join(".");
      return `  - ${pathStr || "(root)"}: ${issue.message}`;
    })
    .join("\n");
}

/**
 * Load cslint.toml from the project root. The file is optional; without it
 * every setting keeps its default.
 */
export async function loadConfig(projectRoot: string): Promise<Config> {
  const configPath = join(projectRoot, CONFIG_FILENAME);

  if (!existsSync(configPath)) {
    return {};
  }

  const parsed = await parseTomlFile(configPath);
  const result = configSchema.safeParse(parsed);

  if (!result.success) {
    throw new ConfigError(
      `Invalid ${CONFIG_FILENAME}:\n${formatZodErrors(result.error.issues)}`,
    );
  }

  return result.data;
}

/**
 * Resolve a path to an absolute directory path.
 * If the path is a file, returns its parent directory.
 */
function resolveToDirectory(inputPath: string): string {
  const absolutePath = resolve(inputPath);
  if (existsSync(absolutePath)) {
    const stats = statSync(absolutePath);
    return stats.isDirectory() ? absolutePath : dirname(absolutePath);
  }
  return absolutePath;
}

/**
 * Find the project root by searching for cslint.toml.
 * @param startPath - Optional starting path to search from. Defaults to process.cwd().
 * @returns Absolute path to the nearest directory holding cslint.toml, or the
 *          starting directory when there is none
 */
export function findProjectRoot(startPath?: string): string {
  const start = startPath ? resolveToDirectory(startPath) : process.cwd();
  let dir = start;

  while (dir !== dirname(dir)) {
    if (existsSync(join(dir, CONFIG_FILENAME))) {
      return dir;
    }
    dir = dirname(dir);
  }

  // Check root
  if (existsSync(join(dir, CONFIG_FILENAME))) {
    return dir;
  }

  return start;
}
