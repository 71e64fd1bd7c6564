// SPDX-License-Identifier: Apache-2.0
import { defaultCatalog, type TagCatalog } from "./catalog";
import type { Condition } from "./condition";
import { CatalogMismatchError } from "./errors";
import type { FontAttributes } from "./font-info";
import type { AttributeFilter } from "./int-set";
import { ResolvedTestSet } from "./resolved";
import type { Selection } from "./selection";

export interface RuleBlock {
  readonly condition: Condition;
  readonly selection: Selection;
}

/**
 * Ordered condition → selection blocks. Every block whose condition accepts
 * a font is applied in order, so later blocks override earlier ones.
 */
export class RuleList {
  readonly catalog: TagCatalog;
  private readonly _blocks: RuleBlock[] = [];

  constructor(catalog: TagCatalog = defaultCatalog()) {
    this.catalog = catalog;
  }

  get blocks(): readonly RuleBlock[] {
    return this._blocks;
  }

  get length(): number {
    return this._blocks.length;
  }

  add(condition: Condition, selection: Selection): void {
    if (selection.catalog !== this.catalog) {
      throw new CatalogMismatchError();
    }
    this._blocks.push({ condition: condition.copy(), selection });
  }

  matchingBlocks(font: FontAttributes): RuleBlock[] {
    return this._blocks.filter((b) => b.condition.accepts(font));
  }

  resolve(font: FontAttributes): ResolvedTestSet {
    const enabled = new Set(this.catalog.tags);
    const filters = new Map<string, AttributeFilter>();
    for (const { selection } of this.matchingBlocks(font)) {
      selection.applyTo(enabled, filters);
    }
    return new ResolvedTestSet(this.catalog, enabled, filters);
  }

  toString(): string {
    return this._blocks.map(({ condition, selection }) => `spec: ${condition}\n${selection}`).join("\n");
  }
}
