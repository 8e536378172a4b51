/**
 * Basic routing example.
 */

import { createLogger, handlerArgs, Router } from "../mod.ts";
import type { RouteParams } from "../mod.ts";

type PageHandler = (args: RouteParams) => string;

const logger = createLogger({ name: "example", level: "debug" });
const router = new Router<PageHandler>({ logger });

let loggedIn = false;

router.add("/", () => "Welcome home");
router.add("/about", () => "About us");
router
  .add("/users/{id}", (args) => `User #${String(args.id)}`)
  .setFilter("id", /^[0-9]+$/);
router
  .add("/admin", () => "Admin panel")
  .addRequisite(() => {
    logger.info("checking session");
    return loggedIn;
  });
router.add("/assets/[*]", (args) => `Static asset (${String(args.cache)})`)
  .addParam("cache", "max-age=3600");
router.add("404", () => "Not found");

function render(uri: string): string {
  const match = router.resolve(uri);
  return match ? match.handler(handlerArgs(match)) : "No route";
}

for (const uri of ["/", "/users/42", "/users/abc", "/admin", "/assets/app.css"]) {
  console.log(`${uri} -> ${render(uri)}`);
}

loggedIn = true;
console.log(`/admin -> ${render("/admin")}`);
