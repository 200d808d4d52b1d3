import type { Request, Response } from "express";
import { sendError, simulatorOf } from "./jobs.js";

export function healthGet(req: Request, res: Response) {
  try {
    const health = simulatorOf(req).health();
    res.json({
      ok: true,
      name: "jobsim",
      time: Math.floor(Date.now() / 1000),
      mode: health.policy,
      latency_ms: health.baseLatencyMs,
      seed: health.seed,
      random_weights: health.weights ?? null,
      jobs: health.jobs,
    });
  } catch (e) {
    sendError(res, e);
  }
}
