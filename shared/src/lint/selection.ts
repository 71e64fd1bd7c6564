// SPDX-License-Identifier: Apache-2.0
import { defaultCatalog, type TagCatalog } from "./catalog";
import { ArgTypeMismatchError, GrammarError, MultiTagFilterError, UnsupportedRelationError } from "./errors";
import { AttributeFilter, MAX_VALUE, parseIntegerSet } from "./int-set";
import { unquote } from "./condition";

// tag [ (except|only) (cp|gid) values... ]
const ENABLE_CLAUSE_RE = /^"?([0-9a-z/_]+)"?(?:\s+(except|only)\s+(cp|gid)\s+(.+))?$/;
const DISABLE_CLAUSE_RE = /^"?([0-9a-z/_]+)"?$/;

function fullMatch(pattern: string, value: string): boolean {
  return new RegExp(`^(?:${pattern})$`).test(value);
}

/**
 * The enable/disable directives of one rule block. `touched` holds every tag
 * the block names; `enabled` the subset it turns on.
 */
export class Selection {
  readonly catalog: TagCatalog;
  private readonly _touched = new Set<string>();
  private readonly _enabled = new Set<string>();
  private readonly _filters = new Map<string, AttributeFilter>();

  constructor(catalog: TagCatalog = defaultCatalog()) {
    this.catalog = catalog;
  }

  get touched(): ReadonlySet<string> {
    return this._touched;
  }

  get enabled(): ReadonlySet<string> {
    return this._enabled;
  }

  get filters(): ReadonlyMap<string, AttributeFilter> {
    return this._filters;
  }

  get isEmpty(): boolean {
    return this._touched.size === 0;
  }

  enable(tag: string, relation?: string | null, argType?: string | null, arg?: string | null): void {
    const tags = this.catalog.resolveTagSet(tag);
    if (relation !== undefined && relation !== null) {
      if (tags.size > 1) {
        throw new MultiTagFilterError(`options cannot be applied to multiple tags: '${tag}' selects ${tags.size}`);
      }
      const [target] = tags;
      this._filters.set(target, this.buildFilter(target, relation, argType ?? null, arg ?? null));
    }
    for (const t of tags) {
      this._touched.add(t);
      this._enabled.add(t);
    }
  }

  /** Parse and apply one clause of an `enable` list. */
  enableClause(clause: string): void {
    const m = ENABLE_CLAUSE_RE.exec(clause.trim());
    if (!m) {
      throw new GrammarError(`could not parse enable clause '${clause.trim()}'`);
    }
    this.enable(m[1], m[2] ?? null, m[3] ?? null, m[4] === undefined ? null : unquote(m[4].trim()));
  }

  disable(tag: string): void {
    for (const t of this.catalog.resolveTagSet(tag)) {
      this._touched.add(t);
      this._enabled.delete(t);
    }
  }

  /** Parse and apply one clause of a `disable` list. */
  disableClause(clause: string): void {
    const m = DISABLE_CLAUSE_RE.exec(clause.trim());
    if (!m) {
      throw new GrammarError(`could not parse disable clause '${clause.trim()}'`);
    }
    this.disable(m[1]);
  }

  private buildFilter(tag: string, relation: string, argType: string | null, arg: string | null): AttributeFilter {
    const info = this.catalog.get(tag);
    if (!info || info.relation === null || info.argType === null) {
      throw new UnsupportedRelationError(`tag ${tag} does not allow options`);
    }
    if (!fullMatch(info.relation, relation)) {
      throw new UnsupportedRelationError(`tag ${tag} does not allow relation ${relation}`);
    }
    if (argType === null || !fullMatch(info.argType, argType)) {
      throw new ArgTypeMismatchError(`tag ${tag} and relation ${relation} do not allow arg type ${argType ?? "(none)"}`);
    }
    if (argType !== "cp" && argType !== "gid") {
      throw new ArgTypeMismatchError(`unsupported arg type ${argType}`);
    }
    const values = parseIntegerSet(arg ?? "", argType === "cp", MAX_VALUE[argType]);
    return new AttributeFilter(relation !== "except", values, argType);
  }

  /**
   * Fold this block onto a running result: touched tags drop out, enabled
   * tags come back, and filters of touched tags are replaced by this block's.
   */
  applyTo(enabled: Set<string>, filters: Map<string, AttributeFilter>): void {
    for (const tag of this._touched) {
      enabled.delete(tag);
      filters.delete(tag);
    }
    for (const tag of this._enabled) {
      enabled.add(tag);
      const filter = this._filters.get(tag);
      if (filter) filters.set(tag, filter);
    }
  }

  copy(): Selection {
    const result = new Selection(this.catalog);
    for (const t of this._touched) result._touched.add(t);
    for (const t of this._enabled) result._enabled.add(t);
    for (const [t, f] of this._filters) result._filters.set(t, f);
    return result;
  }

  toString(): string {
    const enableList: string[] = [];
    const disableList: string[] = [];
    for (const tag of Array.from(this._touched).sort()) {
      if (this._enabled.has(tag)) {
        const filter = this._filters.get(tag);
        enableList.push(filter ? `${tag} ${filter}` : tag);
      } else {
        disableList.push(tag);
      }
    }
    const lines: string[] = [];
    if (enableList.length > 0) lines.push("enable:", ...enableList.map((t) => `  ${t}`));
    if (disableList.length > 0) lines.push("disable:", ...disableList.map((t) => `  ${t}`));
    return lines.join("\n");
  }
}
