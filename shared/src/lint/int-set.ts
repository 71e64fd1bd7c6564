// SPDX-License-Identifier: Apache-2.0
import { IntegerSetError } from "./errors";

export type ArgType = "cp" | "gid";

/** Largest value a filter of each arg type can name. */
export const MAX_VALUE: Readonly<Record<ArgType, number>> = { cp: 0x10ffff, gid: 0xffff };

const HEX_RE = /^[0-9a-f]+$/i;
const DEC_RE = /^[0-9]+$/;

function parseLiteral(token: string, hex: boolean, max: number, source: string): number {
  if (!(hex ? HEX_RE : DEC_RE).test(token)) {
    throw new IntegerSetError(`could not parse ${hex ? "hex" : "decimal"} value '${token}' in '${source}'`);
  }
  const value = parseInt(token, hex ? 16 : 10);
  if (value > max) {
    const limit = hex ? max.toString(16).toUpperCase() : String(max);
    throw new IntegerSetError(`value '${token}' in '${source}' is above the maximum ${limit}`);
  }
  return value;
}

/**
 * Parse a space-separated list of values and inclusive `lo-hi` ranges.
 *
 * Overlap is an error rather than being merged: the number of values the
 * input names must equal the size of the resulting set. No value may exceed
 * `max`, which defaults to the code point limit for hex and the glyph id
 * limit for decimal.
 */
export function parseIntegerSet(
  text: string,
  hex: boolean,
  max: number = hex ? MAX_VALUE.cp : MAX_VALUE.gid,
): Set<number> {
  const tokens = text.split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length === 0) {
    throw new IntegerSetError("expected at least one value");
  }

  const result = new Set<number>();
  let count = 0;
  for (const token of tokens) {
    if (token.includes("-")) {
      const parts = token.split("-");
      if (parts.length !== 2) {
        throw new IntegerSetError(`could not parse range from '${token}'`);
      }
      const lo = parseLiteral(parts[0], hex, max, text);
      const hi = parseLiteral(parts[1], hex, max, text);
      if (lo >= hi) {
        throw new IntegerSetError(`range '${token}' must have high > low`);
      }
      for (let v = lo; v <= hi; v++) result.add(v);
      count += hi - lo + 1;
    } else {
      result.add(parseLiteral(token, hex, max, text));
      count++;
    }
  }

  if (result.size !== count) {
    throw new IntegerSetError(
      `duplicate values in '${text.trim()}': expected ${count} values but found ${result.size}`,
    );
  }
  return result;
}

/**
 * Render a set back in the list syntax, collapsing consecutive runs into
 * ranges. Code points are written in upper-case hex.
 */
export function formatIntegerSet(values: Iterable<number>, hex: boolean): string {
  const sorted = Array.from(values).sort((a, b) => a - b);
  const fmt = (v: number) => (hex ? v.toString(16).toUpperCase() : String(v));
  const parts: string[] = [];
  let i = 0;
  while (i < sorted.length) {
    let j = i;
    while (j + 1 < sorted.length && sorted[j + 1] === sorted[j] + 1) j++;
    parts.push(j > i ? `${fmt(sorted[i])}-${fmt(sorted[j])}` : fmt(sorted[i]));
    i = j + 1;
  }
  return parts.join(" ");
}

/** Accepts or rejects a glyph id or code point by set membership. */
export class AttributeFilter {
  readonly acceptIfMember: boolean;
  readonly values: ReadonlySet<number>;
  readonly argType: ArgType;

  constructor(acceptIfMember: boolean, values: ReadonlySet<number>, argType: ArgType = "cp") {
    this.acceptIfMember = acceptIfMember;
    this.values = values;
    this.argType = argType;
  }

  accept(value: number): boolean {
    return this.acceptIfMember === this.values.has(value);
  }

  toString(): string {
    const relation = this.acceptIfMember ? "only" : "except";
    return `${relation} ${this.argType} ${formatIntegerSet(this.values, this.argType === "cp")}`;
  }
}
