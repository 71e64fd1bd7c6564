// SPDX-License-Identifier: Apache-2.0
import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { fontAttributes, type FontAttributes } from "@fontlint/shared/src/lint/font-info";
import { parseSpec } from "@fontlint/shared/src/lint/spec-parser";
import type { RuleList } from "@fontlint/shared/src/lint/rule-list";

// YAML reads `weight: 400` and `version: 2.001` as numbers
const Text = z.union([z.string(), z.number()]).transform((v) => String(v));

const FontEntrySchema = z
  .object({
    filename: Text.nullish(),
    name: Text.nullish(),
    style: Text.nullish(),
    script: Text.nullish(),
    variant: Text.nullish(),
    weight: Text.nullish(),
    monospace: z.boolean().optional(),
    hinted: z.boolean().optional(),
    vendor: Text.nullish(),
    version: Text.nullish(),
  })
  .strict();

const FontsFileSchema = z.array(FontEntrySchema).min(1);

export type FontEntry = z.infer<typeof FontEntrySchema>;

/** Parse a YAML list of font descriptions. `file` is only used in messages. */
export function parseFonts(text: string, file: string): FontAttributes[] {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`${file}: YAML parse error: ${msg}`);
  }

  const result = FontsFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    });
    throw new Error(`${file}: invalid font list: ${issues.join("; ")}`);
  }
  return result.data.map((entry) => fontAttributes(entry));
}

export function loadFonts(filePath: string): FontAttributes[] {
  return parseFonts(fs.readFileSync(filePath, "utf-8"), path.basename(filePath));
}

export function loadSpecFile(filePath: string): RuleList {
  const text = fs.readFileSync(filePath, "utf-8");
  try {
    return parseSpec(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`${path.basename(filePath)}: ${msg}`, { cause: e });
  }
}
