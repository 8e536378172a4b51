/**
 * Pattern syntax.
 *
 * - Literal:  `/about`
 * - Variable: `/users/{id}`
 * - Wildcard: `/files/[*]` (fallback, only when no other rule matches)
 */

export const SEPARATOR = "/";
export const WILDCARD = "[*]";
export const VARIABLE_OPEN = "{";
export const VARIABLE_CLOSE = "}";

// Every variable segment collapses to this in a normalized key
export const GENERIC_VARIABLE = VARIABLE_OPEN + VARIABLE_CLOSE;

export type Segment =
  | { kind: "literal"; raw: string }
  | { kind: "variable"; raw: string; name: string }
  | { kind: "wildcard"; raw: string };

export function splitPath(path: string): string[] {
  return path.split(SEPARATOR);
}

/**
 * Name of a `{name}` segment, or null if the segment is not a variable.
 * `{}` has no name and is a literal.
 */
export function variableName(segment: string): string | null {
  if (
    segment.length > GENERIC_VARIABLE.length &&
    segment.startsWith(VARIABLE_OPEN) &&
    segment.endsWith(VARIABLE_CLOSE)
  ) {
    return segment.slice(1, -1);
  }
  return null;
}

export function parseSegment(raw: string): Segment {
  if (raw === WILDCARD) {
    return { kind: "wildcard", raw };
  }
  const name = variableName(raw);
  if (name !== null) {
    return { kind: "variable", raw, name };
  }
  return { kind: "literal", raw };
}

export function parsePattern(pattern: string): Segment[] {
  return splitPath(pattern).map(parseSegment);
}

/**
 * Key under which a pattern is stored. Patterns that differ only in
 * variable names share a key: `/user/{id}` and `/user/{name}` both give
 * `/user/{}`.
 */
export function normalizePattern(pattern: string): string {
  return splitPath(pattern)
    .map((raw) => (variableName(raw) === null ? raw : GENERIC_VARIABLE))
    .join(SEPARATOR);
}
