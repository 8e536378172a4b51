import type { Handler, Match, RouteParams, RouteVars } from "./types.ts";

// Null prototype, so a key such as "__proto__" is stored like any other
export function createParams<T>(): Record<string, T> {
  return Object.create(null);
}

export function createMatch<THandler extends Handler>(
  handler: THandler,
  routeVars: RouteVars,
  params: RouteParams,
): Match<THandler> {
  return Object.freeze({
    handler,
    routeVars: Object.freeze(
      Object.assign(createParams<string | null>(), routeVars),
    ),
    params: Object.freeze(Object.assign(createParams<unknown>(), params)),
  });
}

/**
 * Arguments for the matched handler: route variables with the rule's
 * static params layered on top.
 *
 * @example
 * ```typescript
 * const match = router.resolve(uri);
 * if (match) {
 *   await match.handler(handlerArgs(match));
 * }
 * ```
 */
export function handlerArgs(match: Match<Handler>): RouteParams {
  return Object.assign(createParams<unknown>(), match.routeVars, match.params);
}
