import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger, isLogger } from "../src/logger/mod.ts";
import { formatPretty } from "../src/logger/logger.ts";

describe("createLogger", () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, "write").mockImplementation((chunk) => {
      stderr.push(String(chunk));
      return true;
    });
    vi.spyOn(Date, "now").mockReturnValue(1000);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write JSON lines in json mode", () => {
    const logger = createLogger({ json: true, name: "trellis" });

    logger.info("rule registered", { pattern: "/a" });

    expect(stdout).toEqual([
      '{"level":"info","time":1000,"msg":"rule registered","pattern":"/a","name":"trellis"}\n',
    ]);
  });

  it("should respect the log level", () => {
    const logger = createLogger({ json: true, level: "warn" });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(stdout).toEqual([
      '{"level":"warn","time":1000,"msg":"shown"}\n',
    ]);
  });

  it("should write errors to stderr", () => {
    const logger = createLogger({ json: true });

    logger.error("boom");
    logger.fatal("worse");

    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      '{"level":"error","time":1000,"msg":"boom"}\n',
      '{"level":"fatal","time":1000,"msg":"worse"}\n',
    ]);
  });

  it("should write nothing when silent", () => {
    const logger = createLogger({ level: "silent" });

    logger.fatal("nothing");

    expect(stderr).toEqual([]);
  });

  it("should combine names and bindings in child loggers", () => {
    const logger = createLogger({ json: true, name: "trellis" });
    const child = logger.child({ name: "router", table: "main" });

    child.info("ready");

    expect(stdout).toEqual([
      '{"level":"info","time":1000,"msg":"ready","table":"main","name":"trellis:router"}\n',
    ]);
  });
});

describe("formatPretty", () => {
  it("should format level, name, message and data", () => {
    const line = formatPretty(
      { level: "warn", time: 0, msg: "no rule to override", pattern: "/a" },
      "trellis",
      false,
    );

    expect(line).toBe(
      "\x1b[36m\x1b[1m[trellis]\x1b[0m \x1b[33mWARN \x1b[0m no rule to override \x1b[2mpattern=\x1b[0m/a\n",
    );
  });
});

describe("isLogger", () => {
  it("should accept loggers and reject other values", () => {
    expect(isLogger(createLogger())).toBe(true);
    expect(isLogger({ info: () => {} })).toBe(false);
    expect(isLogger(null)).toBe(false);
    expect(isLogger({ level: "debug" })).toBe(false);
  });

  it("should reject objects missing any level method", () => {
    const noop = () => {};
    const complete = {
      trace: noop,
      debug: noop,
      info: noop,
      warn: noop,
      error: noop,
      fatal: noop,
      child: noop,
    };
    const without = (method: string) =>
      Object.fromEntries(
        Object.entries(complete).filter(([key]) => key !== method),
      );

    expect(isLogger(complete)).toBe(true);
    expect(isLogger(without("debug"))).toBe(false);
    expect(isLogger(without("fatal"))).toBe(false);
  });
});
