/**
 * Segment-by-segment matching of URIs against a rule table.
 *
 * Rules are tried in registration order and the first one that fits wins,
 * with one exception: a wildcard rule only wins when no other rule matches
 * the whole URI. The wildcard check runs a second scan with wildcards
 * disabled, so recursion is at most one level deep.
 */

import { createMatch, createParams } from "./match.ts";
import { splitPath } from "./pattern.ts";
import type { Rule } from "./rule.ts";
import type { RuleTable } from "./rule_table.ts";
import type { Handler, Match, RequisitePolicy, RouteVars } from "./types.ts";
import { assertArgument, booleanArg, stringArg } from "./validation.ts";

export class Matcher<THandler extends Handler = Handler> {
  constructor(
    private readonly table: RuleTable<THandler>,
    private readonly policy: RequisitePolicy,
  ) {}

  /**
   * Find the rule for a URI.
   *
   * @param ignoreWildcard Treat `[*]` segments as plain literals
   * @returns The match, or null when no rule fits
   * @throws {InvalidArgumentError} If uri is not a string or
   * ignoreWildcard is not a boolean
   */
  match(uri: string, ignoreWildcard = false): Match<THandler> | null {
    assertArgument(stringArg, uri, 'Method "match" argument 1');
    assertArgument(booleanArg, ignoreWildcard, 'Method "match" argument 2');

    return this.scan(uri, splitPath(uri), ignoreWildcard);
  }

  private scan(
    uri: string,
    uriSegments: readonly string[],
    ignoreWildcard: boolean,
  ): Match<THandler> | null {
    for (const rule of this.table.values()) {
      // Requisites run before the pattern is looked at, so their side
      // effects happen for every rule reached in the scan.
      if (!rule.passesRequisites(this.policy)) {
        continue;
      }

      const routeVars = this.tryRule(rule, uri, uriSegments, ignoreWildcard);
      if (routeVars) {
        return createMatch(rule.getHandler(), routeVars, rule.getParams());
      }
    }

    return null;
  }

  /**
   * Captured variables when the rule accepts the URI, null otherwise.
   */
  private tryRule(
    rule: Rule<THandler>,
    uri: string,
    uriSegments: readonly string[],
    ignoreWildcard: boolean,
  ): RouteVars | null {
    const segments = rule.segments();
    const routeVars: RouteVars = createParams();
    const len = Math.max(segments.length, uriSegments.length);

    for (let i = 0; i < len; i++) {
      const segment = segments.at(i);
      const uriSegment = uriSegments.at(i);

      // Pattern ran out before the URI did
      if (segment === undefined) {
        return null;
      }

      switch (segment.kind) {
        case "wildcard":
          if (!ignoreWildcard) {
            return this.scan(uri, uriSegments, true) === null
              ? routeVars
              : null;
          }
          if (segment.raw !== uriSegment) {
            return null;
          }
          break;

        case "literal":
          if (segment.raw !== uriSegment) {
            return null;
          }
          break;

        case "variable": {
          const filter = rule.getFilter(segment.name);
          if (
            filter !== undefined &&
            (uriSegment === undefined || !filter.test(uriSegment))
          ) {
            return null;
          }
          routeVars[segment.name] = uriSegment ?? null;
          break;
        }
      }
    }

    return segments.length === uriSegments.length ? routeVars : null;
  }
}
