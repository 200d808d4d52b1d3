/**
 * Job API routes - Express handlers. Wire format is snake_case.
 */

import type { Request, Response } from "express";
import { z } from "zod";
import {
  JobSimulator,
  SimulatorError,
  SimulatorErrorCode,
  DEFAULT_JOB_TIMEOUT_MS,
  type JobRecord,
} from "../../src/lib/simulator/index.js";

const JobCreateSchema = z.object({
  op: z.string().trim().min(1, "Missing op"),
  args: z.record(z.string(), z.unknown()).default({}),
  timeout_ms: z.number().int().nonnegative().default(DEFAULT_JOB_TIMEOUT_MS),
  trace_id: z.string().nullable().optional(),
});

const STATUS_BY_CODE: Record<string, number> = {
  [SimulatorErrorCode.NOT_FOUND]: 404,
  [SimulatorErrorCode.ALREADY_TERMINAL]: 409,
  [SimulatorErrorCode.DUPLICATE_ID]: 409,
  [SimulatorErrorCode.INVALID_TRANSITION]: 409,
  [SimulatorErrorCode.INVALID_ARGS]: 400,
};

function paramId(req: Request, name: string): string {
  const v = req.params[name];
  return Array.isArray(v) ? v[0] ?? "" : (v ?? "");
}

export function simulatorOf(req: Request): JobSimulator {
  const sim: unknown = req.app.locals.simulator;
  if (!(sim instanceof JobSimulator)) {
    throw new Error("Job simulator is not configured on this app");
  }
  return sim;
}

export function sendError(res: Response, e: unknown) {
  if (e instanceof SimulatorError) {
    const status = STATUS_BY_CODE[e.code] ?? 500;
    return res.status(status).json({ error: { code: e.code, message: e.message } });
  }
  console.error("[jobs] unexpected error:", e);
  return res.status(500).json({
    error: { code: "INTERNAL_ERROR", message: e instanceof Error ? e.message : "Internal server error" },
  });
}

export function toJobStatus(job: JobRecord) {
  return {
    id: job.id,
    state: job.state,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
    result: job.result
      ? {
          text: job.result.text,
          usage: {
            prompt_tokens: job.result.usage.promptTokens,
            completion_tokens: job.result.usage.completionTokens,
          },
        }
      : null,
    error: job.error ?? null,
  };
}

export function jobsPost(req: Request, res: Response) {
  try {
    const parsed = JobCreateSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
      return res.status(400).json({ error: { code: "BAD_REQUEST", message } });
    }
    const { op, args, timeout_ms, trace_id } = parsed.data;
    const job = simulatorOf(req).submit({ op, args, timeoutMs: timeout_ms, traceId: trace_id ?? null });
    return res.status(201).json({ id: job.id, state: job.state, created_at: job.createdAt });
  } catch (e) {
    return sendError(res, e);
  }
}

export function jobGet(req: Request, res: Response) {
  try {
    const job = simulatorOf(req).get(paramId(req, "id"));
    return res.json(toJobStatus(job));
  } catch (e) {
    return sendError(res, e);
  }
}

export function jobRequestGet(req: Request, res: Response) {
  try {
    const view = simulatorOf(req).inspect(paramId(req, "id"));
    return res.json({
      op: view.op,
      args: view.args,
      timeout_ms: view.timeoutMs,
      trace_id: view.traceId,
      chosen_mode: view.mode,
      policy: view.policy,
      base_latency_ms: view.baseLatencyMs,
      random_weights: view.weights ?? null,
      seed: view.seed,
    });
  } catch (e) {
    return sendError(res, e);
  }
}

export function jobCancelPost(req: Request, res: Response) {
  try {
    const job = simulatorOf(req).cancel(paramId(req, "id"));
    return res.json({ id: job.id, state: job.state });
  } catch (e) {
    return sendError(res, e);
  }
}
