// SPDX-License-Identifier: Apache-2.0
import { TagCatalog } from "./catalog";
import { fontAttributes, type FontAttributes } from "./font-info";

// ---------------------------------------------------------------------------
// Small catalog (18 tags)
// ---------------------------------------------------------------------------
// bounds                      | bounds/glyph | ui_ymax, ymax take filters
// cmap -- comment             | tables/{missing,unexpected}, script_required
// complex                     | gpos/missing
// name -- comment             | copyright, version/{hinted_suffix,match_head}
// reachable

export const CATALOG_TEXT = `
name -- name table tests
  copyright
  version
    hinted_suffix
    match_head
cmap -- cmap table tests
  tables
    missing
    unexpected
  script_required except|only cp
bounds
  glyph
    ymax except|only cp|gid
    ui_ymax except|only cp|gid
complex
  gpos
    missing
reachable
`;

export const catalog = TagCatalog.parse(CATALOG_TEXT);

export function font(fields: Partial<FontAttributes> = {}): FontAttributes {
  return fontAttributes({ filename: "NotoSans-Regular.ttf", name: "Noto Sans", ...fields });
}
