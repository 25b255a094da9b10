/**
 * Tests for the unified configuration system
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { config, defineConfig } from "../src/config.js";

const ENV_KEYS = ["BACKTRACK_TRACING", "BACKTRACK_LOGLEVEL", "BACKTRACK_LIMITS__MAXREADS"];

function clearEnv(): void {
  for (const key of ENV_KEYS) {
    delete process.env[key];
  }
}

describe("config.get and config.set", () => {
  beforeEach(() => {
    clearEnv();
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  it("should return default values", () => {
    expect(config.get("logLevel")).toBe("warn");
    expect(config.get("tracing")).toBe(false);
    expect(config.get("limits")).toEqual({});
    expect(config.get("limits.maxReads")).toBeUndefined();
  });

  it("should merge programmatic values", () => {
    config.set({ limits: { maxReads: 100 } });
    config.set({ tracing: true });
    expect(config.get("limits.maxReads")).toBe(100);
    expect(config.get("tracing")).toBe(true);
    expect(config.get("logLevel")).toBe("warn");
  });

  it("should keep custom keys", () => {
    config.set({ grammar: { name: "json" } });
    expect(config.get("grammar.name")).toBe("json");
    expect(config.has("grammar.name")).toBe(true);
    expect(config.has("grammar.missing")).toBe(false);
  });

  it("should return undefined for paths through non-objects", () => {
    expect(config.get("logLevel.nested")).toBeUndefined();
  });

  it("should forget programmatic values on reset", () => {
    config.set({ tracing: true });
    config.reset();
    expect(config.get("tracing")).toBe(false);
  });

  it("should expose all values", () => {
    config.set({ tracing: true });
    expect(config.getAll()).toEqual({ logLevel: "warn", tracing: true, limits: {} });
  });

  it("should not let changes to getAll() leak into the store", () => {
    config.set({ limits: { maxReads: 10 } });
    const all = config.getAll();
    const limits = all.limits;
    if (typeof limits === "object" && limits !== null) {
      Object.assign(limits, { maxReads: 99 });
    }
    all.tracing = true;
    expect(config.maxReads()).toBe(10);
    expect(config.tracingEnabled()).toBe(false);
  });
});

describe("typed readers", () => {
  beforeEach(() => {
    clearEnv();
    config.reset();
  });

  afterEach(() => {
    clearEnv();
    config.reset();
  });

  it("logLevel reads the configured level", () => {
    config.set({ logLevel: "debug" });
    expect(config.logLevel()).toBe("debug");
  });

  it("logLevel falls back to warn for unknown values", () => {
    process.env.BACKTRACK_LOGLEVEL = "loud";
    expect(config.get("logLevel")).toBe("loud");
    expect(config.logLevel()).toBe("warn");
  });

  it("tracingEnabled is true only for true", () => {
    expect(config.tracingEnabled()).toBe(false);
    config.set({ tracing: true });
    expect(config.tracingEnabled()).toBe(true);
  });

  it("maxReads accepts only positive integers", () => {
    expect(config.maxReads()).toBeUndefined();
    config.set({ limits: { maxReads: 50 } });
    expect(config.maxReads()).toBe(50);
    config.set({ limits: { maxReads: 0 } });
    expect(config.maxReads()).toBeUndefined();
    config.set({ limits: { maxReads: 2.5 } });
    expect(config.maxReads()).toBeUndefined();
  });
});

describe("environment variables", () => {
  beforeEach(() => {
    clearEnv();
    config.reset();
  });

  afterEach(() => {
    clearEnv();
    config.reset();
  });

  it("should override defaults", () => {
    process.env.BACKTRACK_TRACING = "1";
    process.env.BACKTRACK_LOGLEVEL = "debug";
    process.env.BACKTRACK_LIMITS__MAXREADS = "500";

    expect(config.tracingEnabled()).toBe(true);
    expect(config.logLevel()).toBe("debug");
    expect(config.get("limits.maxReads")).toBe(500);
  });

  it("should parse false values", () => {
    process.env.BACKTRACK_TRACING = "false";
    expect(config.get("tracing")).toBe(false);
  });

  it("should combine with later programmatic values", () => {
    process.env.BACKTRACK_LOGLEVEL = "error";
    config.set({ tracing: true });
    expect(config.logLevel()).toBe("error");
    expect(config.tracingEnabled()).toBe(true);
  });

  it("should win over programmatic values for the same key", () => {
    process.env.BACKTRACK_LOGLEVEL = "error";
    config.set({ logLevel: "debug" });
    expect(config.logLevel()).toBe("error");
  });

  it("should win over programmatic values for nested keys", () => {
    process.env.BACKTRACK_LIMITS__MAXREADS = "500";
    config.set({ limits: { maxReads: 7 } });
    expect(config.maxReads()).toBe(500);
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(() => {
    clearEnv();
    config.reset();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "backtrack-config-"));
    vi.spyOn(process, "cwd").mockReturnValue(dir);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should load .backtrackrc.json", () => {
    const file = path.join(dir, ".backtrackrc.json");
    fs.writeFileSync(file, JSON.stringify({ tracing: true, limits: { maxReads: 10 } }));

    expect(config.tracingEnabled()).toBe(true);
    expect(config.maxReads()).toBe(10);
    expect(config.logLevel()).toBe("warn");
    expect(config.getConfigFilePath()).toBe(file);
  });

  it("should load the backtrack key of package.json", () => {
    fs.writeFileSync(
      path.join(dir, "package.json"),
      JSON.stringify({ name: "fixture", backtrack: { logLevel: "info" } })
    );
    expect(config.logLevel()).toBe("info");
  });

  it("should win over programmatic values", () => {
    fs.writeFileSync(path.join(dir, ".backtrackrc.json"), JSON.stringify({ tracing: true }));
    config.set({ tracing: false, logLevel: "info" });
    expect(config.tracingEnabled()).toBe(true);
    expect(config.logLevel()).toBe("info");
  });

  it("should prefer package.json over .backtrackrc files", () => {
    fs.writeFileSync(path.join(dir, "package.json"), JSON.stringify({ backtrack: { logLevel: "info" } }));
    fs.writeFileSync(path.join(dir, ".backtrackrc.json"), JSON.stringify({ logLevel: "error" }));
    expect(config.logLevel()).toBe("info");
    expect(config.getConfigFilePath()).toBe(path.join(dir, "package.json"));
  });

  it("should let environment variables win over files", () => {
    fs.writeFileSync(path.join(dir, ".backtrackrc.json"), JSON.stringify({ logLevel: "info" }));
    process.env.BACKTRACK_LOGLEVEL = "silent";
    expect(config.logLevel()).toBe("silent");
  });

  it("should reject a config file that is not an object", () => {
    fs.writeFileSync(path.join(dir, ".backtrackrc.json"), JSON.stringify([1, 2]));
    expect(() => config.get("tracing")).toThrow(TypeError);
  });

  it("should report no file when none exists", () => {
    expect(config.getConfigFilePath()).toBeUndefined();
  });
});

describe("defineConfig", () => {
  it("should return its argument", () => {
    const cfg = { tracing: true, limits: { maxReads: 5 } };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});
