/**
 * Trellis - segment-based request routing.
 *
 * @example
 * ```typescript
 * import { handlerArgs, Router } from "trellis";
 *
 * const router = new Router();
 *
 * router.add("/users/{id}", showUser).setFilter("id", /^[0-9]+$/);
 * router.add("/assets/[*]", serveAsset);
 * router.add("404", notFound);
 *
 * const match = router.resolve("/users/42");
 * if (match) {
 *   match.handler(handlerArgs(match));
 * }
 * ```
 *
 * @module
 */

export * from "@trellis/core";
export * from "@trellis/router";
