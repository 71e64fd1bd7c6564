// SPDX-License-Identifier: Apache-2.0
import { defaultCatalog, type TagCatalog } from "./catalog";
import { Condition } from "./condition";
import { LintConfigError } from "./errors";
import { RuleList } from "./rule-list";
import { Selection } from "./selection";

const DIRECTIVE_RE = /^(enable|disable)\s+(.*)$/;

export interface ParseSpecOptions {
  /** Catalog for a new rule list. Ignored when `ruleList` is given. */
  catalog?: TagCatalog;
  /**
   * Append to this list instead of starting a new one. Blocks are appended
   * only once the whole text has parsed.
   */
  ruleList?: RuleList;
}

class SpecParser {
  private readonly rules: RuleList;
  private condition = new Condition();
  private selection: Selection;
  // set once the current block has an enable/disable; the next condition
  // line then starts a new block
  private pendingSelectionStarted = false;

  constructor(rules: RuleList) {
    this.rules = rules;
    this.selection = new Selection(rules.catalog);
  }

  parse(text: string): void {
    const lines = text.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      try {
        this.parseLine(lines[i]);
      } catch (e) {
        if (e instanceof LintConfigError) throw e.atLine(i + 1);
        throw e;
      }
    }
    this.flush();
  }

  private parseLine(raw: string): void {
    const hash = raw.indexOf("#");
    const line = (hash === -1 ? raw : raw.slice(0, hash)).trim();
    if (line === "") return;
    for (const part of line.split(";")) {
      const segment = part.trim();
      if (segment !== "") this.parseSegment(segment);
    }
  }

  private parseSegment(segment: string): void {
    if (segment === "condition") {
      this.flush();
      this.condition = new Condition();
      return;
    }

    const m = DIRECTIVE_RE.exec(segment);
    if (m) {
      for (const clause of m[2].split(",")) {
        if (m[1] === "enable") this.selection.enableClause(clause);
        else this.selection.disableClause(clause);
      }
      this.pendingSelectionStarted = true;
      return;
    }

    // constraints resuming after directives begin a new block that keeps
    // the constraints set so far
    this.flush();
    this.condition.modifyLine(segment);
  }

  private flush(): void {
    if (!this.pendingSelectionStarted) return;
    this.rules.add(this.condition, this.selection);
    this.selection = new Selection(this.rules.catalog);
    this.pendingSelectionStarted = false;
  }
}

/**
 * Parse lint spec text into a rule list. Any malformed line throws a
 * `LintConfigError` carrying its line number.
 */
export function parseSpec(text: string, options: ParseSpecOptions = {}): RuleList {
  const target = options.ruleList;
  const rules = new RuleList(target?.catalog ?? options.catalog ?? defaultCatalog());
  new SpecParser(rules).parse(text);
  if (!target) return rules;
  for (const { condition, selection } of rules.blocks) {
    target.add(condition, selection);
  }
  return target;
}
