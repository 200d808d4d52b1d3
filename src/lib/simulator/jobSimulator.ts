/**
 * Job simulator: resolves each submitted job's mode, stores it and schedules its executor.
 * Modes are drawn synchronously at submission, in submission order, from one shared
 * draw source, so the sequence of modes does not depend on how executions interleave.
 */

import { randomUUID } from "crypto";
import { JsonlEventLog } from "../../logger.js";
import { createSimulatorConfig } from "./config.js";
import { DuplicateIdError, InvalidArgsError } from "./errors.js";
import { SeededDrawSource, type DrawSource } from "./drawSource.js";
import { JobExecutor } from "./jobExecutor.js";
import { JobStore, type Clock } from "./jobStore.js";
import { resolveMode } from "./modeResolver.js";
import type {
  JobInspection,
  JobRecord,
  JobState,
  JobStateCounts,
  JobUsage,
  SimulatorConfig,
  SimulatorHealth,
  SubmitJobInput,
} from "./types.js";

export const DEFAULT_JOB_TIMEOUT_MS = 8000;

export function generateJobId(): string {
  return `job_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

/** Copies args up front so an uncloneable value is rejected before a draw is taken. */
function cloneArgs(args: Record<string, unknown>): Record<string, unknown> {
  try {
    return structuredClone(args);
  } catch (e) {
    throw new InvalidArgsError(e instanceof Error ? e.message : String(e));
  }
}

export interface JobSimulatorOptions {
  clock?: Clock;
  draws?: DrawSource;
  generateId?: () => string;
}

export class JobSimulator {
  readonly config: SimulatorConfig;
  private readonly draws: DrawSource;
  private readonly store: JobStore;
  private readonly executor: JobExecutor;
  private readonly generateId: () => string;
  private readonly eventLog?: JsonlEventLog;
  private readonly counts: JobStateCounts = { queued: 0, running: 0, ok: 0, fail: 0, timeout: 0, cancelled: 0 };
  private readonly usage: JobUsage = { promptTokens: 0, completionTokens: 0 };

  constructor(config: SimulatorConfig = createSimulatorConfig(), options: JobSimulatorOptions = {}) {
    this.config = config;
    this.draws = options.draws ?? new SeededDrawSource(config.seed);
    this.generateId = options.generateId ?? generateJobId;
    this.eventLog = config.logPath ? new JsonlEventLog(config.logPath) : undefined;
    this.store = new JobStore({
      clock: options.clock,
      onTransition: (record, from) => this.recordTransition(record, from),
    });
    this.executor = new JobExecutor(this.store, config);
  }

  submit(input: SubmitJobInput): JobRecord {
    const id = this.generateId();
    // Checked before drawing: a rejected submission leaves the draw sequence untouched.
    if (this.store.has(id)) throw new DuplicateIdError(id);
    const args = cloneArgs(input.args ?? {});
    const mode = resolveMode(this.config.policy, this.config.weights, this.draws, this.config.flakySplit);
    this.store.create({
      id,
      mode,
      policy: this.config.policy,
      op: input.op,
      args,
      timeoutMs: input.timeoutMs ?? DEFAULT_JOB_TIMEOUT_MS,
      traceId: input.traceId ?? null,
    });
    this.counts.queued += 1;
    const record = this.store.get(id);
    this.executor.schedule(id);
    return record;
  }

  get(id: string): JobRecord {
    return this.store.get(id);
  }

  /**
   * Sets the cancel flag, commits `cancelled` and preempts the executor's wait.
   * Throws NotFoundError, or AlreadyTerminalError once the job has finished.
   */
  cancel(id: string): JobRecord {
    this.store.requestCancel(id);
    const record = this.store.transition(id, () => ({
      state: "cancelled",
      error: { code: "CANCELLED", message: "cancelled by client" },
    }));
    this.executor.abort(id);
    return record;
  }

  inspect(id: string): JobInspection {
    const job = this.store.get(id);
    return {
      op: job.op,
      args: job.args,
      timeoutMs: job.timeoutMs,
      traceId: job.traceId,
      mode: job.mode,
      policy: job.policy,
      baseLatencyMs: this.config.baseLatencyMs,
      seed: this.config.seed,
      ...(this.config.policy === "random" ? { weights: { ...this.config.weights } } : {}),
    };
  }

  health(): SimulatorHealth {
    return {
      policy: this.config.policy,
      baseLatencyMs: this.config.baseLatencyMs,
      seed: this.config.seed,
      ...(this.config.policy === "random" ? { weights: { ...this.config.weights } } : {}),
      jobs: { ...this.counts },
      usage: { ...this.usage },
    };
  }

  /** Draws consumed so far by mode resolution. */
  get drawCount(): number {
    return this.draws.count;
  }

  /** Aborts every in-flight job (they end `cancelled`) and flushes the event log. */
  async close(): Promise<void> {
    this.executor.abortAll();
    await new Promise<void>((resolve) => setImmediate(resolve));
    await this.eventLog?.flush();
  }

  private recordTransition(record: JobRecord, from: JobState): void {
    this.counts[from] -= 1;
    this.counts[record.state] += 1;
    if (record.result) {
      this.usage.promptTokens += record.result.usage.promptTokens;
      this.usage.completionTokens += record.result.usage.completionTokens;
    }
    if (this.eventLog && record.state !== "running") {
      this.eventLog.write({
        ts: new Date().toISOString(),
        jobId: record.id,
        traceId: record.traceId,
        op: record.op,
        mode: record.mode,
        policy: record.policy,
        from,
        state: record.state,
        ...(record.error ? { errorCode: record.error.code } : {}),
        ...(record.result ? { usage: record.result.usage } : {}),
        durationMs: record.updatedAt - record.createdAt,
      });
    }
  }
}
