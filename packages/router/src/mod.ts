/**
 * Segment-based routing engine for Trellis.
 *
 * @module
 */

export { Router } from "./router.ts";
export { Rule } from "./rule.ts";
export { RuleTable } from "./rule_table.ts";
export type { RuleTableOptions } from "./rule_table.ts";
export { Matcher } from "./matcher.ts";
export { createMatch, handlerArgs } from "./match.ts";
export {
  GENERIC_VARIABLE,
  normalizePattern,
  parsePattern,
  SEPARATOR,
  VARIABLE_CLOSE,
  VARIABLE_OPEN,
  WILDCARD,
} from "./pattern.ts";
export type { Segment } from "./pattern.ts";
export {
  DuplicateRuleError,
  InvalidArgumentError,
  InvalidPatternError,
  RequisiteError,
} from "./errors.ts";
export type {
  Handler,
  Match,
  Requisite,
  RequisitePolicy,
  RouteParams,
  RouterOptions,
  RouteVars,
} from "./types.ts";
