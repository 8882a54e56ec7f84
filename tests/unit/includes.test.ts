/**
 * Unit tests for includes/index.ts
 */

import { realpathSync } from "fs";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  CircularIncludeError,
  findLocalIncludes,
  ReadError,
  resolveIncludes,
} from "../../src/includes/index.js";
import { parseC } from "../../src/parser/index.js";
import { c } from "../utils/c-source.js";

describe("findLocalIncludes", () => {
  it("returns quoted includes in source order", () => {
    const source = c(
      '#include "b.h"',
      "#include <stdio.h>",
      '#include "util/a.h"',
    );

    expect(findLocalIncludes(parseC(source, "main.c").rootNode)).toEqual([
      "b.h",
      "util/a.h",
    ]);
  });

  it("looks inside header guards and conditional blocks", () => {
    const source = c(
      "#ifndef MAIN_H",
      "#define MAIN_H",
      '#include "types.h"',
      "#ifdef USE_LOG",
      '#include "log.h"',
      "#else",
      '#include "nolog.h"',
      "#endif",
      "#endif",
    );

    expect(findLocalIncludes(parseC(source, "main.h").rootNode)).toEqual([
      "types.h",
      "log.h",
      "nolog.h",
    ]);
  });
});

describe("resolveIncludes", () => {
  let testDir: string;

  async function file(path: string, content: string): Promise<string> {
    const fullPath = join(testDir, path);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content);
    return fullPath;
  }

  beforeEach(async () => {
    testDir = realpathSync(await mkdtemp(join(tmpdir(), "cslint-includes-")));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("returns the root alone when it includes nothing local", async () => {
    const main = await file("main.c", c("#include <stdio.h>", "int x;"));

    expect([...(await resolveIncludes(main))]).toEqual([main]);
  });

  it("follows includes relative to the including file", async () => {
    const main = await file("main.c", c('#include "lib/a.h"'));
    const a = await file("lib/a.h", c('#include "b.h"'));
    const b = await file("lib/b.h", c("int b(void);"));

    expect([...(await resolveIncludes(main))]).toEqual([main, a, b]);
  });

  it("visits a header included twice only once", async () => {
    const main = await file("main.c", c('#include "a.h"', '#include "b.h"'));
    const a = await file("a.h", c('#include "common.h"'));
    const b = await file("b.h", c('#include "common.h"'));
    const common = await file("common.h", c("int shared(void);"));

    expect([...(await resolveIncludes(main))]).toEqual([main, a, common, b]);
  });

  it("reports a cycle with its include chain", async () => {
    const a = await file("a.h", c('#include "b.h"'));
    const b = await file("b.h", c('#include "a.h"'));

    const error = await resolveIncludes(a).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CircularIncludeError);
    expect(error).toMatchObject({ chain: [a, b, a] });
    expect(error).toHaveProperty(
      "message",
      `Circular include: ${a} -> ${b} -> ${a}`,
    );
  });

  it("reports a file including itself", async () => {
    const a = await file("a.h", c('#include "a.h"'));

    await expect(resolveIncludes(a)).rejects.toBeInstanceOf(
      CircularIncludeError,
    );
  });

  it("throws ReadError for a missing include", async () => {
    const main = await file("main.c", c('#include "missing.h"'));

    await expect(resolveIncludes(main)).rejects.toThrow(ReadError);
    await expect(resolveIncludes(main)).rejects.toThrow(
      `Failed to read ${join(testDir, "missing.h")}: `,
    );
  });

  it("follows includes of a file with syntax errors", async () => {
    const main = await file(
      "main.c",
      c('#include "lock.h"', "DEFINE_LOCK(io)", "int main( {"),
    );
    const lock = await file("lock.h", c("int lock(void);"));

    expect([...(await resolveIncludes(main))]).toEqual([main, lock]);
  });
});
