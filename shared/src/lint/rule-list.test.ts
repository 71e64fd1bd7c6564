// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { RuleList } from "./rule-list";
import { Condition } from "./condition";
import { Selection } from "./selection";
import { TagCatalog } from "./catalog";
import { CatalogMismatchError } from "./errors";
import { catalog, font } from "./lint.test-fixtures";

function block(conditionLines: string[], build: (s: Selection) => void): [Condition, Selection] {
  const condition = new Condition();
  for (const line of conditionLines) condition.modifyLine(line);
  const selection = new Selection(catalog);
  build(selection);
  return [condition, selection];
}

describe("RuleList.resolve", () => {
  test("no blocks enables every tag", () => {
    const resolved = new RuleList(catalog).resolve(font());
    expect(resolved.enabled).toEqual(catalog.tags);
    expect(resolved.filters.size).toBe(0);
  });

  test("later disable wins over earlier enable", () => {
    const rules = new RuleList(catalog);
    rules.add(...block(["vendor GOOG"], (s) => s.enable("reachable")));
    rules.add(...block(["script Deva"], (s) => s.disable("reachable")));
    const resolved = rules.resolve(font({ vendor: "GOOG", script: "Deva" }));
    expect(resolved.check("reachable")).toBe(false);
  });

  test("later enable wins over earlier disable", () => {
    const rules = new RuleList(catalog);
    rules.add(...block(["script Deva"], (s) => s.disable("reachable")));
    rules.add(...block(["vendor GOOG"], (s) => s.enable("reachable")));
    const resolved = rules.resolve(font({ vendor: "GOOG", script: "Deva" }));
    expect(resolved.check("reachable")).toBe(true);
  });

  test("blocks whose condition rejects the font are skipped", () => {
    const rules = new RuleList(catalog);
    rules.add(...block(["vendor ADBE"], (s) => s.disable("name")));
    const f = font({ vendor: "GOOG" });
    expect(rules.matchingBlocks(f)).toEqual([]);
    expect(rules.resolve(f).enabled).toEqual(catalog.tags);
  });

  test("re-enabling a filtered tag without a filter clears it", () => {
    const rules = new RuleList(catalog);
    rules.add(...block([], (s) => s.enable("cmap/script_required", "only", "cp", "41")));
    rules.add(...block(["script Deva"], (s) => s.enable("cmap")));
    expect(rules.resolve(font({ script: "Latn" })).getFilter("cmap/script_required")?.toString()).toBe("only cp 41");
    expect(rules.resolve(font({ script: "Deva" })).getFilter("cmap/script_required")).toBeNull();
  });

  test("a block that does not touch a filtered tag keeps its filter", () => {
    const rules = new RuleList(catalog);
    rules.add(...block([], (s) => s.enable("cmap/script_required", "except", "cp", "41")));
    rules.add(...block([], (s) => s.disable("name")));
    expect(rules.resolve(font()).getFilter("cmap/script_required")?.toString()).toBe("except cp 41");
  });

  test("resolving does not change the rule list", () => {
    const rules = new RuleList(catalog);
    rules.add(...block([], (s) => s.disable("reachable")));
    const first = rules.resolve(font());
    first.check("reachable");
    const second = rules.resolve(font());
    expect(second.enabled).toEqual(first.enabled);
    expect(second.skipLog().size).toBe(0);
  });
});

describe("RuleList.add", () => {
  test("stores a copy of the condition", () => {
    const rules = new RuleList(catalog);
    const [condition, selection] = block(["script Deva"], (s) => s.disable("reachable"));
    rules.add(condition, selection);
    condition.modifyLine("script Latn");
    expect(rules.blocks[0].condition.toString()).toBe("Condition(script Deva)");
    expect(rules.length).toBe(1);
  });

  test("rejects a selection from another catalog", () => {
    const rules = new RuleList(catalog);
    const other = new Selection(TagCatalog.parse("reachable"));
    expect(() => rules.add(new Condition(), other)).toThrow(CatalogMismatchError);
    expect(() => rules.add(new Condition(), other)).toThrow("selection was built against a different tag catalog");
    expect(rules.length).toBe(0);
  });

  test("toString lists every block", () => {
    const rules = new RuleList(catalog);
    rules.add(...block(["vendor GOOG"], (s) => s.disable("reachable")));
    rules.add(...block([], (s) => s.enable("name/copyright")));
    expect(rules.toString()).toBe(
      [
        "spec: Condition(vendor GOOG)",
        "disable:",
        "  reachable",
        "spec: Condition()",
        "enable:",
        "  name/copyright",
      ].join("\n"),
    );
  });
});
