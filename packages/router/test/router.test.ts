import { describe, expect, it } from "vitest";
import { DuplicateRuleError, InvalidArgumentError } from "../src/errors.ts";
import { handlerArgs } from "../src/match.ts";
import { Router } from "../src/router.ts";
import type { RouterOptions } from "../src/types.ts";
import { createRecordingLogger, warnings } from "./helpers.ts";

function createSite() {
  const logger = createRecordingLogger();
  const router = new Router({ logger });
  const handlers = {
    home: () => "home",
    about: () => "about",
    user: (args: { id?: unknown }) => `user ${String(args.id)}`,
    files: () => "files",
  };

  router.add("/", handlers.home);
  router.add("/about", handlers.about);
  router.add("/user/{id}", handlers.user);
  router.add("/files/[*]", handlers.files);

  return { router, handlers, logger };
}

describe("Router", () => {
  describe("match()", () => {
    it("should match a static rule with no variables", () => {
      const { router, handlers } = createSite();

      const match = router.match("/about");

      expect(match?.handler).toBe(handlers.about);
      expect(match?.routeVars).toEqual({});
      expect(match?.params).toEqual({});
    });

    it("should extract variables", () => {
      const { router, handlers } = createSite();

      const match = router.match("/user/7");

      expect(match?.handler).toBe(handlers.user);
      expect(match?.routeVars).toEqual({ id: "7" });
    });

    it("should fall back to the wildcard rule", () => {
      const { router, handlers } = createSite();

      expect(router.match("/files/2024/report.pdf")?.handler).toBe(
        handlers.files,
      );
    });

    it("should return null for unknown paths", () => {
      const { router } = createSite();

      expect(router.match("/nope")).toBeNull();
    });
  });

  describe("resolve()", () => {
    it("should return the direct match when there is one", () => {
      const { router, handlers } = createSite();

      expect(router.resolve("/about")?.handler).toBe(handlers.about);
    });

    it("should fall back to the not-found rule", () => {
      const { router } = createSite();
      const notFound = () => "not found";
      router.add("404", notFound).addParam("status", 404);

      const match = router.resolve("/nope");

      expect(match?.handler).toBe(notFound);
      expect(match?.params).toEqual({ status: 404 });
    });

    it("should use a configured not-found pattern", () => {
      const logger = createRecordingLogger();
      const router = new Router({ logger, notFoundPattern: "/errors/missing" });
      const missing = () => "missing";
      router.add("/errors/missing", missing);

      expect(router.resolve("/nope")?.handler).toBe(missing);
    });

    it("should warn and return null without a not-found rule", () => {
      const { router, logger } = createSite();

      expect(router.resolve("/nope")).toBeNull();
      expect(warnings(logger.entries)).toEqual([
        "no not-found rule is registered",
      ]);
    });
  });

  describe("add() and override()", () => {
    it("should throw on duplicate rules", () => {
      const { router } = createSite();

      expect(() => router.add("/user/{name}", () => "name")).toThrow(
        DuplicateRuleError,
      );
    });

    it("should override an existing rule", () => {
      const { router, logger } = createSite();
      const profile = () => "profile";

      router.override("/user/{name}", profile);

      const match = router.match("/user/ada");
      expect(match?.handler).toBe(profile);
      expect(match?.routeVars).toEqual({ name: "ada" });
      expect(warnings(logger.entries)).toEqual([]);
    });

    it("should list rules in matching order", () => {
      const { router } = createSite();

      expect(router.getRules().map((r) => r.getPattern())).toEqual([
        "/",
        "/about",
        "/user/{id}",
        "/files/[*]",
      ]);
      expect(router.size).toBe(4);

      router.clear();
      expect(router.size).toBe(0);
    });
  });

  describe("options", () => {
    it("should apply the prefix from the options", () => {
      const router = new Router({
        prefix: "/app",
        logger: createRecordingLogger(),
      });
      const home = () => "home";
      router.add("/home", home);

      expect(router.getPrefix()).toBe("/app");
      expect(router.match("/app/home")?.handler).toBe(home);
      expect(router.match("/home")).toBeNull();
    });

    it("should change the prefix for later rules only", () => {
      const router = new Router({ logger: createRecordingLogger() });
      router.add("/a", () => "a");
      router.setPrefix("/v2").add("/a", () => "v2");

      expect(router.getRules().map((r) => r.getPattern())).toEqual([
        "/a",
        "/v2/a",
      ]);
    });

    it("should reject malformed options", () => {
      expect(() => new Router({ prefix: "/app/" })).toThrow(
        InvalidArgumentError,
      );
      expect(() => new Router({ prefix: "app" })).toThrow(
        'Router options: prefix: Prefix must start with a forward slash ("/")',
      );
      expect(
        () => new Router({ verbose: true } as unknown as RouterOptions),
      ).toThrow(InvalidArgumentError);
    });

    it("should reject a logger missing level methods", () => {
      const partial = Object.fromEntries(
        Object.entries(createRecordingLogger()).filter(([key]) =>
          key !== "debug"
        ),
      );

      expect(
        () => new Router({ logger: partial as unknown as RouterOptions["logger"] }),
      ).toThrow(InvalidArgumentError);
    });

    it("should accept a logger config instead of a logger", () => {
      expect(
        () => new Router({ logger: { level: "silent", json: true } }),
      ).not.toThrow();
    });

    it("should enforce strict requisites when enabled", () => {
      const router = new Router({
        strictRequisites: true,
        logger: createRecordingLogger(),
      });
      router
        .add("/a", () => "a")
        .addRequisite((() => 1) as unknown as () => boolean);

      expect(() => router.match("/a")).toThrow(
        'A requisite for rule "/a" returned number instead of a boolean',
      );
    });

    it("should warn about non-boolean requisites by default", () => {
      const logger = createRecordingLogger();
      const router = new Router({ logger });
      router
        .add("/a", () => "a")
        .addRequisite((() => 1) as unknown as () => boolean);

      expect(router.match("/a")).not.toBeNull();
      expect(warnings(logger.entries)).toEqual([
        "requisite did not return a boolean; ignoring it",
      ]);
    });
  });

  describe("handlerArgs()", () => {
    it("should merge params over route variables", () => {
      const router = new Router({ logger: createRecordingLogger() });
      router
        .add("/user/{id}/{tab}", () => "user")
        .addParams({ tab: "overview", layout: "wide" });

      const match = router.match("/user/7/settings");

      expect(match).not.toBeNull();
      if (match) {
        expect(handlerArgs(match)).toEqual({
          id: "7",
          tab: "overview",
          layout: "wide",
        });
      }
    });
  });
});
