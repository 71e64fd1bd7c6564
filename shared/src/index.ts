// SPDX-License-Identifier: Apache-2.0
export {
  LintConfigError,
  GrammarError,
  UnknownTagError,
  AmbiguousTagError,
  UnsupportedRelationError,
  ArgTypeMismatchError,
  IntegerSetError,
  MultiTagFilterError,
  CatalogMismatchError,
} from "./lint/errors";
export type { LintConfigErrorCode } from "./lint/errors";

export { parseIntegerSet, formatIntegerSet, AttributeFilter, MAX_VALUE } from "./lint/int-set";
export type { ArgType } from "./lint/int-set";

export { TagCatalog, defaultCatalog } from "./lint/catalog";
export type { TagInfo } from "./lint/catalog";

export { CONDITION_FIELDS, fontAttributes, fontLabel, attributeValue, isConditionField } from "./lint/font-info";
export type { FontAttributes, ConditionField } from "./lint/font-info";

export { Condition, evalRelation, RELATION_OPERATORS, NUMERIC_OPERATORS } from "./lint/condition";
export type { Relation, RelationOperator, NumericOperator, FieldConstraint } from "./lint/condition";

export { Selection } from "./lint/selection";
export { RuleList } from "./lint/rule-list";
export type { RuleBlock } from "./lint/rule-list";
export { ResolvedTestSet } from "./lint/resolved";
export { parseSpec } from "./lint/spec-parser";
export type { ParseSpecOptions } from "./lint/spec-parser";
export { listTags, formatTagListing } from "./lint/listing";
export type { TagListingOptions, TagListingEntry } from "./lint/listing";
