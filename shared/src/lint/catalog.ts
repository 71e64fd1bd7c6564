// SPDX-License-Identifier: Apache-2.0
import fs from "node:fs";
import { AmbiguousTagError, GrammarError, UnknownTagError } from "./errors";

export interface TagInfo {
  /** Pattern the relation word of a filter clause must match, e.g. `except|only`. */
  relation: string | null;
  /** Pattern the argument type must match, e.g. `cp|gid`. */
  argType: string | null;
  comment: string | null;
}

// indent, tag name, optional relation + arg-type pair, optional `--` comment
const LINE_RE = /^(\s*)([a-z0-9_]+)(?:\s+(?!--)(\S+)\s+(\S+))?\s*(?:--\s*(.*?))?\s*$/;

const SEGMENT_DELIMITERS = "/_";

interface Frame {
  indent: number;
  path: string;
}

function parseCatalogText(text: string): Map<string, TagInfo> {
  const info = new Map<string, TagInfo>();
  const stack: Frame[] = [];

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === "") continue;
    const m = LINE_RE.exec(line);
    if (!m) {
      throw new GrammarError(`failed to match catalog line: '${line}'`);
    }
    const indent = m[1].length;
    while (stack.length > 0 && indent <= stack[stack.length - 1].indent) {
      stack.pop();
    }
    const parent = stack[stack.length - 1];
    const path = parent ? `${parent.path}/${m[2]}` : m[2];
    if (info.has(path)) {
      throw new GrammarError(`duplicate catalog tag: ${path}`);
    }
    info.set(path, {
      relation: m[3] ?? null,
      argType: m[4] ?? null,
      comment: m[5] ? m[5] : null,
    });
    stack.push({ indent, path });
  }

  return info;
}

function isDelimited(candidate: string, partial: string): boolean {
  let ix = candidate.indexOf(partial);
  while (ix !== -1) {
    const end = ix + partial.length;
    const before = ix === 0 || SEGMENT_DELIMITERS.includes(candidate[ix - 1]);
    const after = end === candidate.length || SEGMENT_DELIMITERS.includes(candidate[end]);
    if (before && after) return true;
    ix = candidate.indexOf(partial, ix + 1);
  }
  return false;
}

/**
 * The fixed hierarchy of lint test tags. Built once from its text form and
 * never modified afterwards, so one instance can back any number of rule
 * lists and resolutions.
 */
export class TagCatalog {
  /** Every tag path, sorted. */
  readonly tags: readonly string[];
  private readonly _info: ReadonlyMap<string, TagInfo>;

  private constructor(info: Map<string, TagInfo>) {
    this._info = info;
    this.tags = Object.freeze(Array.from(info.keys()).sort());
  }

  static parse(text: string): TagCatalog {
    return new TagCatalog(parseCatalogText(text));
  }

  get size(): number {
    return this.tags.length;
  }

  has(tag: string): boolean {
    return this._info.has(tag);
  }

  get(tag: string): TagInfo | undefined {
    return this._info.get(tag);
  }

  /** The tag itself and every tag below it. */
  subtree(tag: string): Set<string> {
    const prefix = `${tag}/`;
    const result = new Set<string>();
    for (const t of this.tags) {
      if (t === tag || t.startsWith(prefix)) result.add(t);
    }
    return result;
  }

  /** Tags containing `partial` as a segment bounded by `/`, `_` or the string ends. */
  findBySegment(partial: string): string[] {
    if (partial === "") return [];
    return this.tags.filter((t) => isDelimited(t, partial));
  }

  /**
   * Expand a full or partial tag into the set of tags it selects. A full tag
   * selects its subtree; a partial one must name exactly one tag.
   */
  resolveTagSet(tag: string): Set<string> {
    if (this.has(tag)) return this.subtree(tag);

    const candidates = this.findBySegment(tag);
    if (candidates.length === 0) throw new UnknownTagError(tag);
    if (candidates.length > 1) throw new AmbiguousTagError(tag, candidates);
    return this.subtree(candidates[0]);
  }
}

let cached: TagCatalog | null = null;

/** The catalog bundled with this package, parsed on first use. */
export function defaultCatalog(): TagCatalog {
  if (!cached) {
    cached = TagCatalog.parse(fs.readFileSync(new URL("./tags.txt", import.meta.url), "utf-8"));
  }
  return cached;
}
