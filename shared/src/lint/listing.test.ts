// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { formatTagListing, listTags } from "./listing";
import { catalog } from "./lint.test-fixtures";

describe("listTags", () => {
  test("nothing requested lists nothing", () => {
    expect(listTags(catalog, {})).toEqual([]);
  });

  test("tags lists every tag in order", () => {
    const entries = listTags(catalog, { tags: true });
    expect(entries.map((e) => e.tag)).toEqual(catalog.tags);
    expect(entries[0]).toEqual({ tag: "bounds", signature: null, comment: null });
  });

  test("comments alone lists commented tags", () => {
    expect(listTags(catalog, { comments: true })).toEqual([
      { tag: "cmap", signature: null, comment: "cmap table tests" },
      { tag: "name", signature: null, comment: "name table tests" },
    ]);
  });

  test("filters alone lists tags that take a filter", () => {
    expect(listTags(catalog, { filters: true })).toEqual([
      { tag: "bounds/glyph/ui_ymax", signature: "except|only cp|gid", comment: null },
      { tag: "bounds/glyph/ymax", signature: "except|only cp|gid", comment: null },
      { tag: "cmap/script_required", signature: "except|only cp", comment: null },
    ]);
  });
});

describe("formatTagListing", () => {
  test("indents signature and comment under the tag", () => {
    const entries = listTags(catalog, { comments: true, filters: true });
    expect(formatTagListing(entries)).toEqual([
      "bounds/glyph/ui_ymax",
      "  except|only cp|gid",
      "bounds/glyph/ymax",
      "  except|only cp|gid",
      "cmap",
      "  -- cmap table tests",
      "cmap/script_required",
      "  except|only cp",
      "name",
      "  -- name table tests",
    ]);
  });
});
