/**
 * Tests for env-driven simulator config: weight parsing, clamping, defaults.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  createSimulatorConfig,
  getBaseLatencyMs,
  getModePolicy,
  loadSimulatorConfig,
  parseFlakySplit,
  parseModeWeights,
} from "../config.js";

describe("parseModeWeights", () => {
  it("ignores unknown keys and zeroes bad or negative values", () => {
    expect(parseModeWeights("ok=70,echo=10,bogus=5,fail=-3,slow=x, hang = 4 ,timeout")).toEqual({
      ok: 70,
      echo: 10,
      slow: 0,
      fail: 0,
      hang: 4,
      timeout: 0,
      flaky: 0,
    });
  });

  it("returns all zeros for an empty list", () => {
    expect(parseModeWeights("")).toEqual({ ok: 0, echo: 0, slow: 0, fail: 0, hang: 0, timeout: 0, flaky: 0 });
  });
});

describe("parseFlakySplit", () => {
  it("only reads ok, fail and hang", () => {
    expect(parseFlakySplit("ok=2,fail=1,hang=0,slow=9")).toEqual({ ok: 2, fail: 1, hang: 0 });
  });
});

describe("env getters", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads the policy case-insensitively", () => {
    expect(getModePolicy({ JOBSIM_MODE: " RANDOM " })).toBe("random");
    expect(getModePolicy({})).toBe("ok");
  });

  it("falls back to ok on an unknown policy", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(getModePolicy({ JOBSIM_MODE: "chaos" })).toBe("ok");
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('Unknown JOBSIM_MODE "chaos"'));
  });

  it("clamps latency and defaults on garbage", () => {
    expect(getBaseLatencyMs({ JOBSIM_LATENCY_MS: "-5" })).toBe(0);
    expect(getBaseLatencyMs({ JOBSIM_LATENCY_MS: "abc" })).toBe(250);
    expect(getBaseLatencyMs({ JOBSIM_LATENCY_MS: "9999999" })).toBe(600_000);
    expect(getBaseLatencyMs({ JOBSIM_LATENCY_MS: "40" })).toBe(40);
  });
});

describe("loadSimulatorConfig", () => {
  it("uses defaults for an empty env", () => {
    const config = loadSimulatorConfig({});
    expect(config).toEqual({
      policy: "ok",
      weights: { ok: 70, echo: 10, slow: 10, fail: 5, hang: 3, timeout: 2, flaky: 0 },
      flakySplit: { ok: 1, fail: 1, hang: 1 },
      baseLatencyMs: 250,
      seed: 1337,
      failMessage: "simulated error",
    });
  });

  it("reads every setting from env", () => {
    const config = loadSimulatorConfig({
      JOBSIM_MODE: "flaky",
      JOBSIM_RANDOM_WEIGHTS: "ok=1",
      JOBSIM_FLAKY_SPLIT: "ok=0,fail=2,hang=1",
      JOBSIM_LATENCY_MS: "10",
      JOBSIM_SEED: "99",
      JOBSIM_FAIL_MESSAGE: "boom",
      JOBSIM_LOG_PATH: "/tmp/jobsim/events.jsonl",
    });
    expect(config.policy).toBe("flaky");
    expect(config.weights.ok).toBe(1);
    expect(config.weights.echo).toBe(0);
    expect(config.flakySplit).toEqual({ ok: 0, fail: 2, hang: 1 });
    expect(config.baseLatencyMs).toBe(10);
    expect(config.seed).toBe(99);
    expect(config.failMessage).toBe("boom");
    expect(config.logPath).toBe("/tmp/jobsim/events.jsonl");
  });
});

describe("createSimulatorConfig", () => {
  it("freezes the config", () => {
    const config = createSimulatorConfig({ policy: "echo" });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.weights)).toBe(true);
  });

  it("rejects invalid values", () => {
    expect(() => createSimulatorConfig({ baseLatencyMs: -1 })).toThrow();
    expect(() => createSimulatorConfig({ seed: 1.5 })).toThrow();
  });
});
