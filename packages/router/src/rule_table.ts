/**
 * Ordered rule storage keyed by normalized pattern.
 */

import type { Logger } from "@trellis/core";
import { DuplicateRuleError } from "./errors.ts";
import { normalizePattern } from "./pattern.ts";
import { Rule } from "./rule.ts";
import type { Handler } from "./types.ts";
import {
  assertArgument,
  handlerArg,
  prefixSchema,
  stringArg,
} from "./validation.ts";

export interface RuleTableOptions {
  prefix?: string;
  logger: Logger;
}

/**
 * Rules in registration order. Matching walks them in that order, so the
 * first registered rule wins between two that both fit a URI.
 */
export class RuleTable<THandler extends Handler = Handler> {
  private readonly entries = new Map<string, Rule<THandler>>();
  private readonly logger: Logger;
  private prefix: string;

  constructor(options: RuleTableOptions) {
    this.prefix = assertArgument(prefixSchema, options.prefix ?? "", "Prefix");
    this.logger = options.logger;
  }

  /**
   * Set the prefix for rules registered from now on. Existing rules are
   * left as they are.
   *
   * @throws {InvalidArgumentError} If the prefix is non-empty and does not
   * start with `/`, or ends with `/`
   */
  setPrefix(prefix: string): this {
    this.prefix = assertArgument(prefixSchema, prefix, "Prefix");
    return this;
  }

  getPrefix(): string {
    return this.prefix;
  }

  /**
   * Key a pattern would be stored under, prefix included.
   */
  keyOf(pattern: string): string {
    return normalizePattern(this.applyPrefix(pattern));
  }

  /**
   * Register a rule.
   *
   * @throws {DuplicateRuleError} If a rule with the same normalized
   * pattern exists
   * @throws {InvalidArgumentError} If pattern is not a string or handler
   * is not a function
   */
  register(pattern: string, handler: THandler): Rule<THandler> {
    assertArgument(stringArg, pattern, 'Method "register" argument 1');
    assertArgument(handlerArg, handler, 'Method "register" argument 2');

    const prefixed = this.applyPrefix(pattern);
    const key = normalizePattern(prefixed);
    if (this.entries.has(key)) {
      throw new DuplicateRuleError(prefixed, key);
    }

    const rule = new Rule(prefixed, handler);
    this.entries.set(key, rule);
    this.logger.debug("rule registered", { pattern: prefixed, key });

    return rule;
  }

  /**
   * Register a rule, replacing any rule with the same normalized pattern.
   * The new rule goes to the end of the matching order.
   *
   * Logs a warning when there was nothing to replace.
   */
  override(pattern: string, handler: THandler): Rule<THandler> {
    assertArgument(stringArg, pattern, 'Method "override" argument 1');
    assertArgument(handlerArg, handler, 'Method "override" argument 2');

    if (!this.remove(pattern)) {
      this.logger.warn("no rule to override; adding it anyway", {
        pattern: this.applyPrefix(pattern),
      });
    }

    return this.register(pattern, handler);
  }

  get(pattern: string): Rule<THandler> | undefined {
    return this.entries.get(this.keyOf(pattern));
  }

  has(pattern: string): boolean {
    return this.entries.has(this.keyOf(pattern));
  }

  remove(pattern: string): boolean {
    return this.entries.delete(this.keyOf(pattern));
  }

  values(): IterableIterator<Rule<THandler>> {
    return this.entries.values();
  }

  rules(): Rule<THandler>[] {
    return Array.from(this.entries.values());
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private applyPrefix(pattern: string): string {
    return this.prefix !== "" && pattern.startsWith("/")
      ? this.prefix + pattern
      : pattern;
  }
}
