/**
 * Unit tests for checks/identifiers.ts
 */

import { describe, expect, it } from "vitest";

import {
  checkCaseConsistency,
  classifyCase,
  classifyIdentifiers,
} from "../../src/checks/index.js";
import { parseC } from "../../src/parser/index.js";
import type { Identifier } from "../../src/types.js";
import { c } from "../utils/c-source.js";

function classify(source: string) {
  return classifyIdentifiers(parseC(source, "test.c"), "test.c", source);
}

function identifier(
  file: string,
  text: string,
  kind: Identifier["case"],
  line: number,
): Identifier {
  return {
    file,
    text,
    case: kind,
    range: {
      start: { line, column: 1 },
      end: { line, column: text.length + 1 },
      startIndex: 0,
      endIndex: text.length,
    },
  };
}

describe("classifyCase", () => {
  it.each([
    ["item_count", "lower-snake"],
    ["x1_y", "lower-snake"],
    ["snake_case_name", "lower-snake"],
    ["maxItems", "camel"],
    ["getHTTPResponse", "camel"],
    ["parseJson2Xml", "camel"],
  ] as const)("classifies %s as %s", (text, expected) => {
    expect(classifyCase(text)).toBe(expected);
  });

  it.each(["value", "MAX_SIZE", "Item_count", "_private", "PascalCase"])(
    "leaves %s unclassified",
    (text) => {
      expect(classifyCase(text)).toBeNull();
    },
  );
});

describe("classifyIdentifiers", () => {
  it("flags macros that are not SCREAMING_SNAKE_CASE", () => {
    const source = c("#define myMacro 1", "#define MY_MACRO 2");
    const { findings } = classify(source);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      rule: "macro-case",
      message: "Macro is not SCREAMING_SNAKE_CASE",
      snippet: "#define myMacro 1",
      range: { start: { line: 1, column: 9 }, end: { line: 1, column: 16 } },
    });
  });

  it("checks function-like macros", () => {
    const source = c(
      "#define MAX(a, b) ((a) > (b) ? (a) : (b))",
      "#define square(x) ((x) * (x))",
    );
    const { findings } = classify(source);

    expect(findings.map((f) => f.range.start.line)).toEqual([2]);
  });

  it("does not classify macro names as identifiers", () => {
    expect(classify(c("#define buffer_size 64")).identifiers).toEqual([]);
  });

  it("collects declared variables and parameters", () => {
    const source = c(
      "int first_value = 1;",
      "int secondValue;",
      "// Run",
      "void run(int item_count, int maxItems) {",
      "  int local_total = item_count;",
      "}",
    );
    const { findings, identifiers } = classify(source);

    expect(findings).toEqual([]);
    expect(
      identifiers.map((i) => [i.text, i.case]).sort(([a], [b]) =>
        String(a).localeCompare(String(b)),
      ),
    ).toEqual([
      ["first_value", "lower-snake"],
      ["item_count", "lower-snake"],
      ["local_total", "lower-snake"],
      ["maxItems", "camel"],
      ["secondValue", "camel"],
    ]);
  });

  it("records identifier positions", () => {
    const source = c("int x;", "long total_sum = 0;");
    const { identifiers } = classify(source);

    expect(identifiers).toHaveLength(1);
    expect(identifiers[0]).toMatchObject({
      file: "test.c",
      text: "total_sum",
      range: { start: { line: 2, column: 6 }, end: { line: 2, column: 15 } },
    });
  });

  it("does not collect identifiers used as initializers", () => {
    const source = c(
      "// Copy",
      "void copy(void) {",
      "  int a_b = other_val;",
      "}",
    );
    const { identifiers } = classify(source);

    expect(identifiers.map((i) => i.text)).toEqual(["a_b"]);
  });
});

describe("checkCaseConsistency", () => {
  it("reports nothing when only one style is used", () => {
    const identifiers = [
      identifier("a.c", "item_count", "lower-snake", 1),
      identifier("b.c", "max_size", "lower-snake", 2),
    ];

    expect(checkCaseConsistency(identifiers)).toEqual([]);
  });

  it("reports nothing without identifiers", () => {
    expect(checkCaseConsistency([])).toEqual([]);
  });

  it("reports every identifier when both styles are used", () => {
    const identifiers = [
      identifier("a.c", "item_count", "lower-snake", 1),
      identifier("b.c", "maxItems", "camel", 3),
    ];
    const findings = checkCaseConsistency(identifiers);

    expect(findings).toHaveLength(2);
    expect(findings[0]).toMatchObject({
      file: "a.c",
      rule: "identifier-case",
      message: "Snake case identifier contributes to case inconsistency",
      snippet: "item_count",
      subFindings: [],
    });
    expect(findings[1]).toMatchObject({
      file: "b.c",
      message: "Camel case identifier contributes to case inconsistency",
      snippet: "maxItems",
      range: { start: { line: 3, column: 1 } },
    });
  });
});
