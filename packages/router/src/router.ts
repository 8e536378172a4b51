/**
 * Router facade over a rule table and its matcher.
 *
 * Design:
 * - Rules stored in registration order for predictable priority
 * - Patterns parsed once at registration
 * - Wildcard rules act as fallbacks regardless of where they were added
 * - Matching is synchronous and read-only; build the table at startup
 */

import { createLogger, isLogger } from "@trellis/core";
import type { Logger } from "@trellis/core";
import { Matcher } from "./matcher.ts";
import type { Rule } from "./rule.ts";
import { RuleTable } from "./rule_table.ts";
import type { Handler, Match, RouterOptions } from "./types.ts";
import { assertArgument, routerOptionsSchema } from "./validation.ts";

/**
 * Router class for registering rules and matching URIs against them.
 *
 * @example
 * ```typescript
 * const router = new Router();
 *
 * router.add("/users", listUsers);
 * router.add("/users/{id}", showUser).setFilter("id", /^[0-9]+$/);
 * router.add("404", notFound);
 *
 * const match = router.resolve("/users/123");
 * if (match) {
 *   match.handler(handlerArgs(match));
 * }
 * ```
 */
export class Router<THandler extends Handler = Handler> {
  private readonly table: RuleTable<THandler>;
  private readonly matcher: Matcher<THandler>;
  private readonly logger: Logger;
  private readonly notFoundPattern: string;

  /**
   * @throws {InvalidArgumentError} If the options are malformed
   */
  constructor(options: RouterOptions = {}) {
    const resolved = assertArgument(
      routerOptionsSchema,
      options,
      "Router options",
    );

    this.logger = isLogger(resolved.logger)
      ? resolved.logger
      : createLogger({ name: "trellis", level: "warn", ...resolved.logger });
    this.notFoundPattern = resolved.notFoundPattern;
    this.table = new RuleTable<THandler>({
      prefix: resolved.prefix,
      logger: this.logger,
    });
    this.matcher = new Matcher(this.table, {
      strict: resolved.strictRequisites,
      logger: this.logger,
    });
  }

  /**
   * Register a new rule.
   *
   * @throws {DuplicateRuleError} If a rule differing at most in variable
   * names is already registered
   */
  add(pattern: string, handler: THandler): Rule<THandler> {
    return this.table.register(pattern, handler);
  }

  /**
   * Register a rule in place of an existing one with the same normalized
   * pattern. Warns, but still registers, when there is none.
   */
  override(pattern: string, handler: THandler): Rule<THandler> {
    return this.table.override(pattern, handler);
  }

  setPrefix(prefix: string): this {
    this.table.setPrefix(prefix);
    return this;
  }

  getPrefix(): string {
    return this.table.getPrefix();
  }

  /**
   * Find the first rule matching the URI.
   */
  match(uri: string, ignoreWildcard = false): Match<THandler> | null {
    return this.matcher.match(uri, ignoreWildcard);
  }

  /**
   * Match the URI, falling back to the not-found rule.
   *
   * Returns null and logs a warning when neither matches.
   */
  resolve(uri: string): Match<THandler> | null {
    const match = this.matcher.match(uri);
    if (match) {
      return match;
    }

    this.logger.debug("no rule matched", { uri });

    const fallback = this.matcher.match(this.notFoundPattern);
    if (!fallback) {
      this.logger.warn("no not-found rule is registered", {
        uri,
        notFoundPattern: this.notFoundPattern,
      });
    }

    return fallback;
  }

  /**
   * Get all registered rules, in matching order.
   */
  getRules(): Rule<THandler>[] {
    return this.table.rules();
  }

  /**
   * Remove all rules.
   */
  clear(): void {
    this.table.clear();
  }

  get size(): number {
    return this.table.size;
  }
}
