/**
 * Simulator config: env-based getters with safe parsing and clamped defaults,
 * assembled into an immutable SimulatorConfig validated with zod.
 */

import { z } from "zod";
import {
  MODE_POLICIES,
  type FlakySplit,
  type ModePolicy,
  type ModeWeights,
  type SimulatorConfig,
} from "./types.js";

type Env = Record<string, string | undefined>;

export const DEFAULT_RANDOM_WEIGHTS = "ok=70,echo=10,slow=10,fail=5,hang=3,timeout=2,flaky=0";
export const DEFAULT_FLAKY_SPLIT = "ok=1,fail=1,hang=1";
export const DEFAULT_LATENCY_MS = 250;
export const DEFAULT_SEED = 1337;
export const DEFAULT_FAIL_MESSAGE = "simulated error";

const MAX_LATENCY_MS = 600_000;

const WeightSchema = z.number().int().nonnegative();

export const SimulatorConfigSchema = z.object({
  policy: z.enum(["ok", "echo", "slow", "fail", "hang", "timeout", "flaky", "random"]),
  weights: z.object({
    ok: WeightSchema,
    echo: WeightSchema,
    slow: WeightSchema,
    fail: WeightSchema,
    hang: WeightSchema,
    timeout: WeightSchema,
    flaky: WeightSchema,
  }),
  flakySplit: z.object({ ok: WeightSchema, fail: WeightSchema, hang: WeightSchema }),
  baseLatencyMs: z.number().int().min(0).max(MAX_LATENCY_MS),
  seed: z.number().int(),
  failMessage: z.string().min(1),
  logPath: z.string().min(1).optional(),
});

function readEnv(env: Env, key: string): string | undefined {
  const raw = env[key];
  if (raw == null || raw.trim() === "") return undefined;
  return raw.trim();
}

function parseIntEnv(env: Env, key: string, defaultVal: number, min: number, max: number): number {
  const raw = readEnv(env, key);
  if (raw == null) return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

function hasKey<K extends string>(table: Record<K, number>, key: string): key is K {
  return Object.prototype.hasOwnProperty.call(table, key);
}

/**
 * Parse "ok=70,echo=10,..." over the keys of `zero`.
 * Unknown keys are ignored, missing keys keep 0, unparseable or negative values are 0.
 */
export function parseWeightList<K extends string>(list: string, zero: Record<K, number>): Record<K, number> {
  const out = { ...zero };
  for (const part of list.split(",")) {
    const trimmed = part.trim();
    const eq = trimmed.indexOf("=");
    if (eq <= 0) continue;
    const key = trimmed.slice(0, eq).trim();
    if (!hasKey(out, key)) continue;
    const n = parseInt(trimmed.slice(eq + 1).trim(), 10);
    out[key] = Number.isNaN(n) ? 0 : Math.max(0, n);
  }
  return out;
}

export function parseModeWeights(list: string): ModeWeights {
  return parseWeightList(list, { ok: 0, echo: 0, slow: 0, fail: 0, hang: 0, timeout: 0, flaky: 0 });
}

export function parseFlakySplit(list: string): FlakySplit {
  return parseWeightList(list, { ok: 0, fail: 0, hang: 0 });
}

function isModePolicy(v: string): v is ModePolicy {
  return MODE_POLICIES.some((p) => p === v);
}

export function getModePolicy(env: Env = process.env): ModePolicy {
  const raw = readEnv(env, "JOBSIM_MODE");
  if (raw == null) return "ok";
  const v = raw.toLowerCase();
  if (isModePolicy(v)) return v;
  console.warn(`[config] Unknown JOBSIM_MODE "${raw}", falling back to "ok"`);
  return "ok";
}

/** Base latency in ms. Default 250, clamped to [0, 600000]. */
export function getBaseLatencyMs(env: Env = process.env): number {
  return parseIntEnv(env, "JOBSIM_LATENCY_MS", DEFAULT_LATENCY_MS, 0, MAX_LATENCY_MS);
}

export function getSeed(env: Env = process.env): number {
  return parseIntEnv(env, "JOBSIM_SEED", DEFAULT_SEED, Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER);
}

export function getPort(env: Env = process.env): number {
  return parseIntEnv(env, "PORT", 8000, 1, 65_535);
}

export function loadSimulatorConfig(env: Env = process.env): SimulatorConfig {
  return createSimulatorConfig({
    policy: getModePolicy(env),
    weights: parseModeWeights(readEnv(env, "JOBSIM_RANDOM_WEIGHTS") ?? DEFAULT_RANDOM_WEIGHTS),
    flakySplit: parseFlakySplit(readEnv(env, "JOBSIM_FLAKY_SPLIT") ?? DEFAULT_FLAKY_SPLIT),
    baseLatencyMs: getBaseLatencyMs(env),
    seed: getSeed(env),
    failMessage: readEnv(env, "JOBSIM_FAIL_MESSAGE") ?? DEFAULT_FAIL_MESSAGE,
    logPath: readEnv(env, "JOBSIM_LOG_PATH"),
  });
}

/** Fills defaults, validates, and freezes. Throws a ZodError on invalid input. */
export function createSimulatorConfig(partial: Partial<SimulatorConfig> = {}): SimulatorConfig {
  const parsed = SimulatorConfigSchema.parse({
    policy: partial.policy ?? "ok",
    weights: partial.weights ?? parseModeWeights(DEFAULT_RANDOM_WEIGHTS),
    flakySplit: partial.flakySplit ?? parseFlakySplit(DEFAULT_FLAKY_SPLIT),
    baseLatencyMs: partial.baseLatencyMs ?? DEFAULT_LATENCY_MS,
    seed: partial.seed ?? DEFAULT_SEED,
    failMessage: partial.failMessage ?? DEFAULT_FAIL_MESSAGE,
    ...(partial.logPath != null ? { logPath: partial.logPath } : {}),
  });
  return Object.freeze({
    ...parsed,
    weights: Object.freeze(parsed.weights),
    flakySplit: Object.freeze(parsed.flakySplit),
  });
}
