// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { parseSpec } from "@fontlint/shared/src/lint/spec-parser";
import { TagCatalog } from "@fontlint/shared/src/lint/catalog";
import { fontAttributes } from "@fontlint/shared/src/lint/font-info";
import { COLORS, formatCheck, formatResolution } from "./reporter";

const catalog = TagCatalog.parse(["cmap", "  script_required except|only cp", "  tables", "reachable"].join("\n"));

describe("formatResolution", () => {
  test("lists disabled and filtered tags", () => {
    const rules = parseSpec("disable reachable, tables\nenable script_required only cp 41-43", { catalog });
    const lines = formatResolution("Test.ttf", rules.resolve(fontAttributes()));
    expect(lines).toEqual([
      "── Test.ttf ──",
      "enabled: 2 of 4",
      "disabled (2):",
      "  cmap/tables",
      "  reachable",
      "filters (1):",
      "  cmap/script_required only cp 41-43",
    ]);
  });

  test("everything enabled prints only the count", () => {
    const rules = parseSpec("", { catalog });
    expect(formatResolution("Test.ttf", rules.resolve(fontAttributes()))).toEqual([
      "── Test.ttf ──",
      "enabled: 4 of 4",
    ]);
  });
});

describe("formatCheck", () => {
  test("plain verdicts", () => {
    expect(formatCheck("Test.ttf", "reachable", true)).toBe("Test.ttf: reachable: run");
    expect(formatCheck("Test.ttf", "cmap/script_required", false, 65)).toBe(
      "Test.ttf: cmap/script_required @ 65: skip",
    );
  });

  test("colored verdict", () => {
    expect(formatCheck("Test.ttf", "reachable", true, undefined, COLORS)).toBe(
      "Test.ttf: reachable: \x1b[32mrun\x1b[0m",
    );
  });
});
