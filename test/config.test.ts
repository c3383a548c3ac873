import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { defaults, loadConfigFile, parseConfig, resolveConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("config", () => {
  it("has the documented defaults", () => {
    expect(defaults.timeouts.taskDefault).toBe(60_000);
    expect(defaults.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 10_000 });
    expect(defaults.limits).toEqual({ maxConcurrency: 8, maxRuns: 50, outputTruncation: 200 });
    expect(defaults.store.dbPath.endsWith(join(".stageline", "runs.db"))).toBe(true);
  });

  it("merges overrides per section and returns a fresh object", () => {
    const config = resolveConfig({ retry: { maxAttempts: 5 }, limits: { maxConcurrency: undefined } });
    expect(config.retry).toEqual({ maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 10_000 });
    expect(config.limits.maxConcurrency).toBe(8);
    expect(resolveConfig()).not.toBe(resolveConfig());
    expect(resolveConfig().retry).toEqual(defaults.retry);
  });

  it("rejects unknown sections and invalid values", () => {
    expect(() => parseConfig({ retries: {} })).toThrow(ConfigError);
    expect(() => parseConfig({ retry: { maxAttempts: 0 } })).toThrow("Invalid config: retry.maxAttempts");
    expect(() => parseConfig({ timeouts: { taskDefault: 3_000_000_000 } })).toThrow("Invalid config: timeouts.taskDefault");
    expect(() => parseConfig({ retry: { maxDelayMs: 3_000_000_000 } })).toThrow("Invalid config: retry.maxDelayMs");
  });

  it("loads a config file over the defaults", () => {
    const dir = mkdtempSync(join(tmpdir(), "stageline-config-"));
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify({ timeouts: { taskDefault: 1500 }, store: { dbPath: ":memory:" } }));

    const config = loadConfigFile(path);
    expect(config.timeouts.taskDefault).toBe(1500);
    expect(config.store.dbPath).toBe(":memory:");
    expect(config.retry).toEqual(defaults.retry);
  });

  it("reports unreadable config files", () => {
    expect(() => loadConfigFile(join(tmpdir(), "stageline-missing", "config.json"))).toThrow(/^Cannot read config file/);
  });
});
