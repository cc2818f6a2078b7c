/**
 * Tests for command line parsing and runtime option resolution.
 */

import path from "path";
import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import { parseCli } from "@/bootstrap/cli";
import { resolveRuntimeOptions } from "@/bootstrap/env";

const argv = (...args: string[]) => ["node", "tiktok-live-monitor", ...args];

describe("parseCli", () => {
  it("reads every flag", () => {
    expect(
      parseCli(argv("-c", "my.json", "-s", "test-secret", "-d", "us-eastred", "-i", "15", "-o", "out", "-m", "2", "-v"))
    ).toEqual({
      config: "my.json",
      sessionId: "test-secret",
      dataCenter: "us-eastred",
      checkInterval: 15,
      outputDir: "out",
      maxConcurrent: 2,
      verbose: true,
    });
  });

  it("defaults verbose to false", () => {
    expect(parseCli(argv())).toEqual({ verbose: false });
  });

  it("rejects a non-integer cap", () => {
    expect(() => parseCli(argv("--max-concurrent", "1.5"))).toThrow(CommanderError);
  });
});

describe("resolveRuntimeOptions", () => {
  it("prefers flags over the environment", () => {
    const options = resolveRuntimeOptions(
      { config: "cli.json", checkInterval: 20, verbose: false },
      { MONITOR_CONFIG: "env.json", CONTROL_DIR: "/tmp/control", PROBE_TIMEOUT_SECONDS: "4" }
    );

    expect(options.configFile).toBe(path.resolve("cli.json"));
    expect(options.controlDir).toBe("/tmp/control");
    expect(options.probeTimeoutMs).toBe(4000);
    expect(options.connectTimeoutMs).toBe(30_000);
    expect(options.defaultPauseSeconds).toBe(300);
    expect(options.overrides).toEqual({
      checkIntervalSeconds: 20,
      maxConcurrentRecordings: undefined,
      outputDirectory: undefined,
      sessionId: undefined,
      targetIdc: undefined,
    });
  });

  it("falls back to the environment, then defaults", () => {
    const options = resolveRuntimeOptions({ verbose: true }, { MONITOR_CONFIG: "env.json" });

    expect(options.configFile).toBe(path.resolve("env.json"));
    expect(options.logDir).toBe(path.resolve("logs"));
    expect(options.verbose).toBe(true);
  });

  it("rejects a non-positive timeout", () => {
    expect(() => resolveRuntimeOptions({ verbose: false }, { FINALIZE_TIMEOUT_SECONDS: "0" })).toThrow(
      'FINALIZE_TIMEOUT_SECONDS must be a positive number, got "0"'
    );
  });
});
