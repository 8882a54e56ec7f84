/**
 * Unit tests for cli/output.ts
 * Colors are decided on every call from the environment and stdout.
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { colors, colorsEnabled } from "../../src/cli/output.js";

function setTTY(value: boolean | undefined): void {
  Object.defineProperty(process.stdout, "isTTY", { value, writable: true });
}

describe("colors", () => {
  const originalEnv = { ...process.env };
  const originalIsTTY = process.stdout.isTTY;

  beforeEach(() => {
    delete process.env.NO_COLOR;
    delete process.env.FORCE_COLOR;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    setTTY(originalIsTTY);
  });

  describe("when colors are enabled (TTY)", () => {
    beforeEach(() => setTTY(true));

    it("wraps text with ANSI codes", () => {
      expect(colors.red("error")).toBe("\x1b[31merror\x1b[0m");
      expect(colors.green("clean")).toBe("\x1b[32mclean\x1b[0m");
      expect(colors.yellow("skipped")).toBe("\x1b[33mskipped\x1b[0m");
      expect(colors.cyan("main.c:1:1")).toBe("\x1b[36mmain.c:1:1\x1b[0m");
      expect(colors.dim("1)")).toBe("\x1b[90m1)\x1b[0m");
    });
  });

  describe("when NO_COLOR is set", () => {
    beforeEach(() => setTTY(true));

    it("returns plain text", () => {
      process.env.NO_COLOR = "1";

      expect(colors.red("error")).toBe("error");
      expect(colorsEnabled()).toBe(false);
    });

    it("disables colors for an empty value too", () => {
      process.env.NO_COLOR = "";

      expect(colorsEnabled()).toBe(false);
    });
  });

  describe("when FORCE_COLOR is set", () => {
    beforeEach(() => setTTY(false));

    it("enables colors even when not a TTY", () => {
      process.env.FORCE_COLOR = "1";

      expect(colors.red("error")).toBe("\x1b[31merror\x1b[0m");
    });

    it("takes precedence over NO_COLOR", () => {
      process.env.FORCE_COLOR = "1";
      process.env.NO_COLOR = "1";

      expect(colorsEnabled()).toBe(true);
    });
  });

  describe("when not a TTY", () => {
    it("returns plain text for piped output", () => {
      setTTY(false);

      expect(colors.cyan("main.c:1:1")).toBe("main.c:1:1");
    });

    it("returns plain text when isTTY is undefined", () => {
      setTTY(undefined);

      expect(colorsEnabled()).toBe(false);
    });
  });
});
