// SPDX-License-Identifier: Apache-2.0
import type { TagCatalog } from "./catalog";

export interface TagListingOptions {
  /** List every tag, not only annotated ones. */
  tags?: boolean;
  comments?: boolean;
  /** Show the relation/arg-type signature of tags that take a filter. */
  filters?: boolean;
}

export interface TagListingEntry {
  tag: string;
  signature: string | null;
  comment: string | null;
}

export function listTags(catalog: TagCatalog, options: TagListingOptions): TagListingEntry[] {
  const entries: TagListingEntry[] = [];
  for (const tag of catalog.tags) {
    const info = catalog.get(tag);
    if (!info) continue;
    const comment = options.comments ? info.comment : null;
    const signature =
      options.filters && info.relation !== null && info.argType !== null
        ? `${info.relation} ${info.argType}`
        : null;
    if (options.tags || comment !== null || signature !== null) {
      entries.push({ tag, signature, comment });
    }
  }
  return entries;
}

export function formatTagListing(entries: TagListingEntry[]): string[] {
  const lines: string[] = [];
  for (const e of entries) {
    lines.push(e.tag);
    if (e.signature) lines.push(`  ${e.signature}`);
    if (e.comment) lines.push(`  -- ${e.comment}`);
  }
  return lines;
}
