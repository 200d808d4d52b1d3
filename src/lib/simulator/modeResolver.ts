/**
 * Mode resolution: turns the global policy into a concrete per-job mode.
 * Consumes exactly 0 draws (fixed policy, all-zero weights) or 1 draw (flaky, random).
 * Later jobs' modes depend on this count, so it must stay exact.
 */

import { mix32, type DrawSource } from "./drawSource.js";
import {
  FLAKY_MODES,
  WEIGHTED_MODES,
  type FlakyMode,
  type FlakySplit,
  type JobMode,
  type ModePolicy,
  type ModeWeights,
} from "./types.js";

export const EQUAL_FLAKY_SPLIT: FlakySplit = { ok: 1, fail: 1, hang: 1 };

/**
 * Weighted bucket selection over `order` using a single 32-bit draw.
 * Returns null when every weight is zero.
 */
export function pickWeighted<K extends string>(
  order: readonly K[],
  weights: Partial<Record<K, number>>,
  draw: number
): K | null {
  let total = 0;
  for (const key of order) total += weightOf(weights[key]);
  if (total <= 0) return null;
  const point = draw % total;
  let acc = 0;
  for (const key of order) {
    const w = weightOf(weights[key]);
    if (w === 0) continue;
    acc += w;
    if (point < acc) return key;
  }
  return null;
}

function weightOf(w: number | undefined): number {
  if (w == null || !Number.isFinite(w) || w <= 0) return 0;
  return Math.floor(w);
}

function pickFlaky(split: FlakySplit, draw: number): FlakyMode {
  return pickWeighted(FLAKY_MODES, split, draw) ?? pickWeighted(FLAKY_MODES, EQUAL_FLAKY_SPLIT, draw) ?? "ok";
}

export function resolveMode(
  policy: ModePolicy,
  weights: Partial<ModeWeights>,
  draws: DrawSource,
  flakySplit: FlakySplit = EQUAL_FLAKY_SPLIT
): JobMode {
  switch (policy) {
    case "flaky":
      return pickFlaky(flakySplit, draws.next());
    case "random": {
      const hasWeight = WEIGHTED_MODES.some((m) => weightOf(weights[m]) > 0);
      if (!hasWeight) return "ok";
      const draw = draws.next();
      const picked = pickWeighted(WEIGHTED_MODES, weights, draw) ?? "ok";
      // flaky under random re-mixes the same draw; no second draw is taken
      return picked === "flaky" ? pickFlaky(flakySplit, mix32(draw)) : picked;
    }
    default:
      return policy;
  }
}
