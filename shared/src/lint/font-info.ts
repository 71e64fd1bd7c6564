// SPDX-License-Identifier: Apache-2.0

/** Descriptive metadata of one font instance, as seen by lint conditions. */
export interface FontAttributes {
  readonly filename: string | null;
  readonly name: string | null;
  readonly style: string | null;
  readonly script: string | null;
  readonly variant: string | null;
  readonly weight: string | null;
  readonly monospace: boolean;
  readonly hinted: boolean;
  readonly vendor: string | null;
  readonly version: string | null;
}

/** The attributes a condition can constrain (everything but `monospace`). */
export const CONDITION_FIELDS = [
  "filename",
  "name",
  "style",
  "script",
  "variant",
  "weight",
  "hinted",
  "vendor",
  "version",
] as const;

export type ConditionField = (typeof CONDITION_FIELDS)[number];

const FIELD_NAMES = new Set<string>(CONDITION_FIELDS);

export function isConditionField(field: string): field is ConditionField {
  return FIELD_NAMES.has(field);
}

export function fontAttributes(fields: Partial<FontAttributes> = {}): FontAttributes {
  return Object.freeze({
    filename: fields.filename ?? null,
    name: fields.name ?? null,
    style: fields.style ?? null,
    script: fields.script ?? null,
    variant: fields.variant ?? null,
    weight: fields.weight ?? null,
    monospace: fields.monospace ?? false,
    hinted: fields.hinted ?? false,
    vendor: fields.vendor ?? null,
    version: fields.version ?? null,
  });
}

/**
 * String form of an attribute for condition matching. `hinted` is compared
 * as `"true"` or `"false"`.
 */
export function attributeValue(font: FontAttributes, field: ConditionField): string | null {
  if (field === "hinted") return String(font.hinted);
  return font[field];
}

/** Short human label for reports. */
export function fontLabel(font: FontAttributes): string {
  return font.filename ?? font.name ?? "(unnamed font)";
}
