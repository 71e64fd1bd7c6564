// SPDX-License-Identifier: Apache-2.0

export type LintConfigErrorCode =
  | "GRAMMAR"
  | "UNKNOWN_TAG"
  | "AMBIGUOUS_TAG"
  | "UNSUPPORTED_RELATION"
  | "ARG_TYPE_MISMATCH"
  | "INTEGER_SET"
  | "MULTI_TAG_FILTER"
  | "CATALOG_MISMATCH";

/**
 * Base class for every failure raised while loading a tag catalog or a lint
 * spec. All of them mean the configuration is broken; none is raised while
 * resolving an already-loaded spec against a font.
 */
export class LintConfigError extends Error {
  readonly code: LintConfigErrorCode;
  /** 1-based line of the spec text that failed, when known. */
  line?: number;

  constructor(code: LintConfigErrorCode, message: string) {
    super(message);
    this.name = "LintConfigError";
    this.code = code;
  }

  /** Attach a source line once; later calls keep the innermost line. */
  atLine(line: number): this {
    if (this.line === undefined) {
      this.line = line;
      this.message = `line ${line}: ${this.message}`;
    }
    return this;
  }
}

export class GrammarError extends LintConfigError {
  constructor(message: string) {
    super("GRAMMAR", message);
    this.name = "GrammarError";
  }
}

export class UnknownTagError extends LintConfigError {
  readonly tag: string;

  constructor(tag: string, message = `unknown tag: ${tag}`) {
    super("UNKNOWN_TAG", message);
    this.name = "UnknownTagError";
    this.tag = tag;
  }
}

export class AmbiguousTagError extends LintConfigError {
  readonly tag: string;
  readonly candidates: readonly string[];

  constructor(tag: string, candidates: readonly string[]) {
    super("AMBIGUOUS_TAG", `multiple matches for partial tag ${tag}: ${candidates.join(", ")}`);
    this.name = "AmbiguousTagError";
    this.tag = tag;
    this.candidates = candidates;
  }
}

export class UnsupportedRelationError extends LintConfigError {
  constructor(message: string) {
    super("UNSUPPORTED_RELATION", message);
    this.name = "UnsupportedRelationError";
  }
}

export class ArgTypeMismatchError extends LintConfigError {
  constructor(message: string) {
    super("ARG_TYPE_MISMATCH", message);
    this.name = "ArgTypeMismatchError";
  }
}

export class IntegerSetError extends LintConfigError {
  constructor(message: string) {
    super("INTEGER_SET", message);
    this.name = "IntegerSetError";
  }
}

export class MultiTagFilterError extends LintConfigError {
  constructor(message: string) {
    super("MULTI_TAG_FILTER", message);
    this.name = "MultiTagFilterError";
  }
}

/** A block's selection was built against a catalog other than its rule list's. */
export class CatalogMismatchError extends LintConfigError {
  constructor(message = "selection was built against a different tag catalog") {
    super("CATALOG_MISMATCH", message);
    this.name = "CatalogMismatchError";
  }
}
