// SPDX-License-Identifier: Apache-2.0
import type { TagCatalog } from "./catalog";
import { UnknownTagError } from "./errors";
import type { AttributeFilter } from "./int-set";

/**
 * The tests enabled for one font, with their filters. Records which tags the
 * checks asked about so a run can report what it ran and what it skipped.
 * Owned by a single validation pass.
 */
export class ResolvedTestSet {
  readonly catalog: TagCatalog;
  private readonly _enabled: ReadonlySet<string>;
  private readonly _filters: ReadonlyMap<string, AttributeFilter>;
  private readonly _runLog = new Set<string>();
  private readonly _skipLog = new Set<string>();

  constructor(catalog: TagCatalog, enabled: Iterable<string>, filters: ReadonlyMap<string, AttributeFilter>) {
    this.catalog = catalog;
    this._enabled = new Set(enabled);
    this._filters = new Map(filters);
  }

  /** Enabled tags, sorted. */
  get enabled(): string[] {
    return Array.from(this._enabled).sort();
  }

  /** Catalog tags that are not enabled, sorted. */
  get disabled(): string[] {
    return this.catalog.tags.filter((t) => !this._enabled.has(t));
  }

  get filters(): ReadonlyMap<string, AttributeFilter> {
    return this._filters;
  }

  private requireTag(tag: string): void {
    if (!this.catalog.has(tag)) {
      throw new UnknownTagError(tag, `unrecognized tag ${tag}`);
    }
  }

  getFilter(tag: string): AttributeFilter | null {
    this.requireTag(tag);
    return this._filters.get(tag) ?? null;
  }

  check(tag: string): boolean {
    this.requireTag(tag);
    const run = this._enabled.has(tag);
    if (run) this._runLog.add(tag);
    else this._skipLog.add(tag);
    return run;
  }

  /** Like `check`, but a filtered tag only runs for values its filter accepts. */
  checkValue(tag: string, value: number): boolean {
    const run = this.check(tag);
    if (!run) return false;
    const filter = this._filters.get(tag);
    return filter ? filter.accept(value) : true;
  }

  runLog(): ReadonlySet<string> {
    return new Set(this._runLog);
  }

  skipLog(): ReadonlySet<string> {
    return new Set(this._skipLog);
  }

  toString(): string {
    const lines: string[] = [];
    if (this._runLog.size === 0 && this._skipLog.size === 0) {
      for (const tag of this.enabled) {
        const filter = this._filters.get(tag);
        lines.push(filter ? `${tag} ${filter}` : tag);
      }
      return lines.join("\n");
    }
    if (this._runLog.size > 0) {
      lines.push("run:", ...Array.from(this._runLog).sort().map((t) => `  ${t}`));
    }
    if (this._skipLog.size > 0) {
      lines.push("skipped:", ...Array.from(this._skipLog).sort().map((t) => `  ${t}`));
    }
    return lines.join("\n");
  }
}
