// SPDX-License-Identifier: Apache-2.0
import cac from "cac";
import { defaultCatalog } from "@fontlint/shared/src/lint/catalog";
import { fontAttributes, fontLabel, type FontAttributes } from "@fontlint/shared/src/lint/font-info";
import { formatTagListing, listTags } from "@fontlint/shared/src/lint/listing";
import { loadFonts, loadSpecFile } from "./loader";
import { COLORS, PLAIN, formatCheck, formatResolution } from "./reporter";
import { createLogger } from "./log";

process.stdout.on("error", (err: NodeJS.ErrnoException) => {
  if (err.code === "EPIPE") process.exit(0);
  throw err;
});

type OptionValue = string | number | undefined;

interface ResolveOptions {
  fonts?: string;
  filename?: OptionValue;
  name?: OptionValue;
  style?: OptionValue;
  script?: OptionValue;
  variant?: OptionValue;
  weight?: OptionValue;
  vendor?: OptionValue;
  fontVersion?: OptionValue;
  monospace: boolean;
  hinted: boolean;
  tag?: string;
  value?: OptionValue;
  color: boolean;
  verbose: boolean;
}

// cac turns numeric-looking values into numbers
function text(value: OptionValue): string | null {
  return value === undefined ? null : String(value);
}

function parseCheckValue(value: OptionValue): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`--value must be a non-negative integer, got '${value}'`);
  }
  return n;
}

function fontsFromOptions(options: ResolveOptions): FontAttributes[] {
  if (options.fonts) return loadFonts(options.fonts);
  return [
    fontAttributes({
      filename: text(options.filename),
      name: text(options.name),
      style: text(options.style),
      script: text(options.script),
      variant: text(options.variant),
      weight: text(options.weight),
      vendor: text(options.vendor),
      version: text(options.fontVersion),
      monospace: options.monospace,
      hinted: options.hinted,
    }),
  ];
}

function fail(err: unknown): never {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${msg}\n`);
  process.exit(1);
}

const cli = cac("font-lint-config");

cli
  .command("tags", "List the tags of the lint test catalog")
  .option("--comments", "Show tag comments", { default: false })
  .option("--filters", "Show the filter signature of tags that accept one", { default: false })
  .option("--annotated-only", "Only list tags that have a comment or filter to show", { default: false })
  .action((options: { comments: boolean; filters: boolean; annotatedOnly: boolean }) => {
    const entries = listTags(defaultCatalog(), {
      tags: !options.annotatedOnly,
      comments: options.comments,
      filters: options.filters,
    });
    if (entries.length === 0) {
      createLogger(false).notice("nothing to list.");
      return;
    }
    process.stdout.write(formatTagListing(entries).join("\n") + "\n");
  });

cli
  .command("parse <spec>", "Parse a lint spec file and print its rule blocks")
  .action((spec: string) => {
    try {
      const rules = loadSpecFile(spec);
      process.stdout.write(rules.toString() + "\n");
    } catch (err) {
      fail(err);
    }
  });

cli
  .command("resolve <spec>", "Resolve which lint tests run for one or more fonts")
  .option("--fonts <file>", "YAML list of font descriptions")
  .option("--filename <filename>", "Font file name")
  .option("--name <name>", "Family name")
  .option("--style <style>", "Style")
  .option("--script <script>", "Script code, e.g. Deva")
  .option("--variant <variant>", "Variant")
  .option("--weight <weight>", "Weight")
  .option("--vendor <vendor>", "Vendor id")
  .option("--font-version <version>", "Font version")
  .option("--monospace", "Font is monospaced", { default: false })
  .option("--hinted", "Font is hinted", { default: false })
  .option("--tag <tag>", "Only report whether this tag runs")
  .option("--value <value>", "With --tag, test this code point or glyph id against the tag's filter")
  .option("--color", "Colorize output", { default: false })
  .option("--verbose", "Print which rule blocks matched", { default: false })
  .action((spec: string, options: ResolveOptions) => {
    try {
      const logger = createLogger(options.verbose);
      const rules = loadSpecFile(spec);
      logger.verbose(`Loaded ${rules.length} rule blocks from ${spec}`);
      const fonts = fontsFromOptions(options);
      const value = parseCheckValue(options.value);
      const palette = options.color ? COLORS : PLAIN;

      for (const font of fonts) {
        const label = fontLabel(font);
        const matching = rules.matchingBlocks(font);
        logger.verbose(`${label}: ${matching.length} of ${rules.length} blocks match`);
        for (const block of matching) {
          logger.verbose(String(block.condition), 1);
        }

        const resolved = rules.resolve(font);
        if (options.tag) {
          const run = value === undefined ? resolved.check(options.tag) : resolved.checkValue(options.tag, value);
          process.stdout.write(formatCheck(label, options.tag, run, value, palette) + "\n");
        } else {
          process.stdout.write(formatResolution(label, resolved, palette).join("\n") + "\n");
        }
      }
    } catch (err) {
      fail(err);
    }
  });

cli.help();
cli.parse();
