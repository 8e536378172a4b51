/**
 * A single routing rule: pattern, handler and everything that narrows
 * when the rule applies.
 */

import { createLogger } from "@trellis/core";
import { InvalidPatternError, RequisiteError } from "./errors.ts";
import { createParams } from "./match.ts";
import { parsePattern } from "./pattern.ts";
import type { Segment } from "./pattern.ts";
import type {
  Handler,
  Requisite,
  RequisitePolicy,
  RouteParams,
} from "./types.ts";
import {
  assertArgument,
  filterArg,
  handlerArg,
  requisiteArg,
  stringArg,
} from "./validation.ts";

const DEFAULT_POLICY: RequisitePolicy = {
  strict: false,
  logger: createLogger({ name: "trellis", level: "warn" }),
};

/**
 * Compile a filter. Global and sticky flags are dropped so that `test()`
 * does not carry `lastIndex` from one match attempt to the next.
 */
function compileFilter(routeVar: string, filter: string | RegExp): RegExp {
  const source = typeof filter === "string" ? filter : filter.source;
  const flags = typeof filter === "string"
    ? ""
    : filter.flags.replace(/[gy]/g, "");

  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new InvalidPatternError(
      `Filter for "${routeVar}" must be a valid regular expression. Input was: ${source}`,
      {
        routeVar,
        filter: source,
        reason: error instanceof Error ? error.message : String(error),
      },
    );
  }
}

/**
 * Routing rule.
 *
 * Returned by `Router.add()` for further configuration. Every setter
 * returns the rule so calls can be chained.
 *
 * @example
 * ```typescript
 * router.add("/users/{id}", showUser)
 *   .setFilter("id", /^[0-9]+$/)
 *   .addParam("view", "profile")
 *   .addRequisite(() => session.isLoggedIn());
 * ```
 */
export class Rule<THandler extends Handler = Handler> {
  private pattern: string;
  private handler: THandler;
  private parsed: Segment[];
  private readonly params: RouteParams = createParams();
  private readonly filters = new Map<string, RegExp>();
  private readonly requisites: Requisite[] = [];

  constructor(pattern: string, handler: THandler) {
    assertArgument(stringArg, pattern, "Rule pattern");
    assertArgument(handlerArg, handler, "Rule handler");

    this.pattern = pattern;
    this.handler = handler;
    this.parsed = parsePattern(pattern);
  }

  /**
   * Replace the pattern. Use `{name}` for variables and `[*]` for a
   * wildcard segment.
   *
   * The rule keeps the table key it was registered under.
   */
  setPattern(pattern: string): this {
    assertArgument(stringArg, pattern, 'Method "setPattern" argument 1');
    this.pattern = pattern;
    this.parsed = parsePattern(pattern);
    return this;
  }

  getPattern(): string {
    return this.pattern;
  }

  /**
   * Parsed pattern segments, in order.
   */
  segments(): readonly Segment[] {
    return this.parsed;
  }

  setHandler(handler: THandler): this {
    assertArgument(handlerArg, handler, 'Method "setHandler" argument 1');
    this.handler = handler;
    return this;
  }

  getHandler(): THandler {
    return this.handler;
  }

  /**
   * Add a static parameter. Parameters are merged over the route
   * variables when the handler arguments are built.
   */
  addParam(key: string, value: unknown): this {
    assertArgument(stringArg, key, 'Method "addParam" argument 1');
    this.params[key] = value;
    return this;
  }

  addParams(params: RouteParams): this {
    for (const [key, value] of Object.entries(params)) {
      this.addParam(key, value);
    }
    return this;
  }

  getParam(key: string): unknown {
    return Object.hasOwn(this.params, key) ? this.params[key] : undefined;
  }

  getParams(): RouteParams {
    return Object.assign(createParams<unknown>(), this.params);
  }

  /**
   * Constrain a route variable. The captured segment must contain a match
   * for the expression; anchor it with `^` and `$` to match the whole
   * segment.
   *
   * @throws {InvalidPatternError} If a string filter does not compile
   */
  setFilter(routeVar: string, filter: string | RegExp): this {
    assertArgument(stringArg, routeVar, 'Method "setFilter" argument 1');
    assertArgument(filterArg, filter, 'Method "setFilter" argument 2');

    this.filters.set(routeVar, compileFilter(routeVar, filter));
    return this;
  }

  getFilter(routeVar: string): RegExp | undefined {
    return this.filters.get(routeVar);
  }

  getFilters(): Record<string, RegExp> {
    return Object.fromEntries(this.filters);
  }

  /**
   * Add a requisite. Requisites run in the order they were added, on
   * every match attempt, and the first one returning `false` stops the
   * rule from matching.
   */
  addRequisite(requisite: Requisite): this {
    assertArgument(requisiteArg, requisite, 'Method "addRequisite" argument 1');
    this.requisites.push(requisite);
    return this;
  }

  getRequisites(): readonly Requisite[] {
    return [...this.requisites];
  }

  /**
   * Run the requisites in order, stopping at the first `false`.
   *
   * A result that is not a boolean is logged and ignored, or rejected with
   * a RequisiteError when the policy is strict.
   */
  passesRequisites(policy: RequisitePolicy = DEFAULT_POLICY): boolean {
    for (const requisite of this.requisites) {
      const result: unknown = requisite();

      if (result === false) {
        return false;
      }

      if (typeof result !== "boolean") {
        if (policy.strict) {
          throw new RequisiteError(
            `A requisite for rule "${this.pattern}" returned ${typeof result} instead of a boolean`,
            { pattern: this.pattern, resultType: typeof result },
          );
        }
        policy.logger.warn("requisite did not return a boolean; ignoring it", {
          pattern: this.pattern,
          resultType: typeof result,
        });
      }
    }

    return true;
  }
}
