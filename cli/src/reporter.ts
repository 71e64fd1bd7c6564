// SPDX-License-Identifier: Apache-2.0
import type { ResolvedTestSet } from "@fontlint/shared/src/lint/resolved";

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export interface Palette {
  green: string;
  red: string;
  dim: string;
  reset: string;
}

export const COLORS: Palette = { green: GREEN, red: RED, dim: DIM, reset: RESET };
export const PLAIN: Palette = { green: "", red: "", dim: "", reset: "" };

/**
 * Summarize one font's resolution as the tags that differ from the default
 * of "everything runs": disabled tags and filtered tags.
 */
export function formatResolution(label: string, resolved: ResolvedTestSet, palette: Palette = PLAIN): string[] {
  const { dim, red, reset } = palette;
  const lines: string[] = [`${dim}── ${label} ──${reset}`];
  const disabled = resolved.disabled;
  const enabledCount = resolved.catalog.size - disabled.length;
  lines.push(`enabled: ${enabledCount} of ${resolved.catalog.size}`);

  if (disabled.length > 0) {
    lines.push(`disabled (${disabled.length}):`);
    for (const tag of disabled) lines.push(`  ${red}${tag}${reset}`);
  }

  const filtered = Array.from(resolved.filters.keys()).sort();
  if (filtered.length > 0) {
    lines.push(`filters (${filtered.length}):`);
    for (const tag of filtered) lines.push(`  ${tag} ${resolved.filters.get(tag)}`);
  }
  return lines;
}

/** One line per font for a single-tag query. */
export function formatCheck(label: string, tag: string, run: boolean, value?: number, palette: Palette = PLAIN): string {
  const { green, red, reset } = palette;
  const verdict = run ? `${green}run${reset}` : `${red}skip${reset}`;
  const target = value === undefined ? tag : `${tag} @ ${value}`;
  return `${label}: ${target}: ${verdict}`;
}
