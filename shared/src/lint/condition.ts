// SPDX-License-Identifier: Apache-2.0
import { GrammarError, UnsupportedRelationError } from "./errors";
import {
  CONDITION_FIELDS,
  attributeValue,
  isConditionField,
  type ConditionField,
  type FontAttributes,
} from "./font-info";

export const NUMERIC_OPERATORS = ["<", "<=", "==", "!=", ">=", ">"] as const;
export type NumericOperator = (typeof NUMERIC_OPERATORS)[number];

export const RELATION_OPERATORS = [...NUMERIC_OPERATORS, "is", "in", "like"] as const;
export type RelationOperator = (typeof RELATION_OPERATORS)[number];

export type Relation =
  | { op: NumericOperator; operand: string; value: number | null }
  | { op: "is"; operand: string }
  | { op: "in"; operand: ReadonlySet<string> }
  | { op: "like"; operand: RegExp };

export type FieldConstraint =
  | { kind: "unconstrained" }
  | { kind: "literal"; value: string }
  | { kind: "relational"; relation: Relation };

const UNCONSTRAINED: FieldConstraint = { kind: "unconstrained" };

const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

const LINE_RE = /^(\S+)\s+(.+)$/;
const QUOTED_RE = /^(["'])(.*)\1$/;

const OPERATOR_NAMES = new Set<string>(RELATION_OPERATORS);

function isRelationOperator(op: string): op is RelationOperator {
  return OPERATOR_NAMES.has(op);
}

function toNumber(s: string): number | null {
  const trimmed = s.trim();
  return NUMBER_RE.test(trimmed) ? Number(trimmed) : null;
}

export function unquote(s: string): string {
  const m = QUOTED_RE.exec(s);
  return m ? m[2] : s;
}

function compareNumeric(op: NumericOperator, lhs: number, rhs: number): boolean {
  switch (op) {
    case "<":
      return lhs < rhs;
    case "<=":
      return lhs <= rhs;
    case "==":
      return lhs === rhs;
    case "!=":
      return lhs !== rhs;
    case ">=":
      return lhs >= rhs;
    case ">":
      return lhs > rhs;
  }
}

/**
 * Evaluate a relation with the font's attribute on the left. Numeric
 * operators compare as floating point; when either side is not a number,
 * `==` and `!=` compare the raw strings and the ordering operators fail.
 */
export function evalRelation(relation: Relation, value: string): boolean {
  switch (relation.op) {
    case "is":
      return value === relation.operand;
    case "in":
      return relation.operand.has(value);
    case "like":
      return relation.operand.test(value);
    default: {
      const lhs = toNumber(value);
      if (lhs === null || relation.value === null) {
        if (relation.op === "==") return value === relation.operand;
        if (relation.op === "!=") return value !== relation.operand;
        return false;
      }
      return compareNumeric(relation.op, lhs, relation.value);
    }
  }
}

function buildRelation(op: RelationOperator, operand: string): Relation {
  if (op === "is") return { op, operand: unquote(operand) };
  if (op === "in") {
    const members = unquote(operand)
      .split(",")
      .map((m) => unquote(m.trim()));
    return { op, operand: new Set(members) };
  }
  if (op === "like") {
    const source = unquote(operand);
    try {
      return { op, operand: new RegExp(source) };
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new GrammarError(`invalid pattern '${source}': ${msg}`);
    }
  }

  const text = unquote(operand);
  const value = toNumber(text);
  if (value === null && op !== "==" && op !== "!=") {
    throw new GrammarError(`relation '${op}' needs a numeric operand, got '${text}'`);
  }
  return { op, operand: text, value };
}

function formatRelation(relation: Relation): string {
  switch (relation.op) {
    case "in":
      return `in ${Array.from(relation.operand).join(",")}`;
    case "like":
      return `like ${relation.operand.source}`;
    default:
      return `${relation.op} ${relation.operand}`;
  }
}

/**
 * A conjunction of per-attribute constraints over a font. Mutated field by
 * field while a spec is parsed; rule lists keep their own copy.
 */
export class Condition {
  private readonly fields: Record<ConditionField, FieldConstraint>;

  constructor(fields?: Partial<Record<ConditionField, FieldConstraint>>) {
    this.fields = {
      filename: UNCONSTRAINED,
      name: UNCONSTRAINED,
      style: UNCONSTRAINED,
      script: UNCONSTRAINED,
      variant: UNCONSTRAINED,
      weight: UNCONSTRAINED,
      hinted: UNCONSTRAINED,
      vendor: UNCONSTRAINED,
      version: UNCONSTRAINED,
      ...fields,
    };
  }

  get(field: ConditionField): FieldConstraint {
    return this.fields[field];
  }

  get isUnconstrained(): boolean {
    return CONDITION_FIELDS.every((f) => this.fields[f].kind === "unconstrained");
  }

  /**
   * Set one field. `*` removes the constraint; without an operand the
   * relation token is taken as a literal to match exactly.
   */
  modify(field: string, relationOrLiteral: string, operand?: string | null): void {
    if (!isConditionField(field)) {
      throw new GrammarError(`condition does not recognize field: ${field}`);
    }
    if (relationOrLiteral === "*") {
      this.fields[field] = UNCONSTRAINED;
      return;
    }
    if (operand === undefined || operand === null || operand === "") {
      this.fields[field] = { kind: "literal", value: unquote(relationOrLiteral) };
      return;
    }
    if (!isRelationOperator(relationOrLiteral)) {
      throw new UnsupportedRelationError(`unknown relation '${relationOrLiteral}' for field ${field}`);
    }
    this.fields[field] = { kind: "relational", relation: buildRelation(relationOrLiteral, operand) };
  }

  /** Apply a `field relation operand` or `field literal` line. */
  modifyLine(line: string): void {
    const m = LINE_RE.exec(line.trim());
    if (!m) {
      throw new GrammarError(`condition could not match '${line.trim()}'`);
    }
    const rest = m[2].trim();
    if (QUOTED_RE.test(rest)) {
      this.modify(m[1], rest);
      return;
    }
    const space = rest.search(/\s/);
    if (space === -1) {
      this.modify(m[1], rest);
      return;
    }
    this.modify(m[1], rest.slice(0, space), rest.slice(space).trim());
  }

  accepts(font: FontAttributes): boolean {
    for (const field of CONDITION_FIELDS) {
      const constraint = this.fields[field];
      if (constraint.kind === "unconstrained") continue;
      const value = attributeValue(font, field);
      if (value === null) return false;
      if (constraint.kind === "literal") {
        if (constraint.value !== value) return false;
      } else if (!evalRelation(constraint.relation, value)) {
        return false;
      }
    }
    return true;
  }

  copy(): Condition {
    return new Condition({ ...this.fields });
  }

  toString(): string {
    const parts: string[] = [];
    for (const field of CONDITION_FIELDS) {
      const constraint = this.fields[field];
      if (constraint.kind === "literal") parts.push(`${field} ${constraint.value}`);
      else if (constraint.kind === "relational") parts.push(`${field} ${formatRelation(constraint.relation)}`);
    }
    return `Condition(${parts.join(", ")})`;
  }
}
