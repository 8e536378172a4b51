/**
 * Type definitions for the router module.
 */

import type { Logger, LoggerConfig } from "@trellis/core";

/**
 * Any callable. The router stores handlers and hands them back on a match;
 * it never calls them, so their signature is left to the application.
 */
export type Handler = (...args: never[]) => unknown;

/**
 * Gate evaluated on every match attempt. Must return `true` for the rule
 * to be considered.
 */
export type Requisite = () => boolean;

/** Values captured from variable segments, `null` where the URI was short. */
export type RouteVars = Record<string, string | null>;

/** Static parameters attached to a rule. */
export type RouteParams = Record<string, unknown>;

export interface Match<THandler extends Handler = Handler> {
  readonly handler: THandler;
  readonly routeVars: Readonly<RouteVars>;
  readonly params: Readonly<RouteParams>;
}

/**
 * How requisite results that are not booleans are treated.
 */
export interface RequisitePolicy {
  /** Throw instead of warning and letting the rule through */
  strict: boolean;
  logger: Logger;
}

/**
 * Configuration for a router.
 *
 * @example
 * ```typescript
 * const router = new Router({
 *   prefix: "/app",
 *   strictRequisites: true,
 *   logger: { level: "debug" },
 * });
 * ```
 */
export interface RouterOptions {
  /** Prepended to every pattern registered afterwards that starts with `/` */
  prefix?: string;
  /** Reject requisites that return something other than a boolean */
  strictRequisites?: boolean;
  /** URI matched by `resolve()` when nothing else matches. Defaults to `"404"` */
  notFoundPattern?: string;
  logger?: Logger | LoggerConfig;
}
