/**
 * Job executor: one async unit per job driving queued -> running -> terminal.
 * The latency wait is preempted by an AbortSignal; whichever of cancellation and
 * natural completion reaches the store first wins, and the loser's
 * AlreadyTerminalError is swallowed here.
 */

import { debugLog } from "../../utils/debug.js";
import { AlreadyTerminalError } from "./errors.js";
import type { JobStore, JobTransition } from "./jobStore.js";
import { generateResult } from "./responseGenerator.js";
import type { JobMode, JobRecord, SimulatorConfig } from "./types.js";

export const SLOW_FACTOR = 6;
export const FAIL_DELAY_CAP_MS = 200;

/** Simulated latency in ms; null means the wait never elapses (hang). */
export function latencyFor(mode: JobMode, baseMs: number): number | null {
  switch (mode) {
    case "ok":
    case "echo":
    case "timeout":
      return baseMs;
    case "slow":
      return baseMs * SLOW_FACTOR;
    case "fail":
      return Math.min(FAIL_DELAY_CAP_MS, baseMs);
    case "hang":
      return null;
  }
}

/**
 * Resolves true when `ms` elapses, false as soon as `signal` aborts.
 * With ms = null only an abort settles it.
 */
export function waitFor(ms: number | null, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => {
      if (timer !== undefined) clearTimeout(timer);
      resolve(false);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    if (ms != null) {
      timer = setTimeout(() => {
        signal.removeEventListener("abort", onAbort);
        resolve(true);
      }, ms);
    }
  });
}

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

type ExecutorConfig = Pick<SimulatorConfig, "baseLatencyMs" | "seed" | "failMessage">;

export class JobExecutor {
  private inflight = new Map<string, AbortController>();

  constructor(
    private readonly store: JobStore,
    private readonly config: ExecutorConfig
  ) {}

  /** Starts the job on a later turn of the event loop. Returns immediately. */
  schedule(id: string): void {
    const controller = new AbortController();
    this.inflight.set(id, controller);
    void this.run(id, controller.signal)
      .catch((e) => {
        console.error(`[JobExecutor] job ${id} failed unexpectedly:`, e instanceof Error ? e.message : e);
      })
      .finally(() => {
        this.inflight.delete(id);
      });
  }

  /** Preempts the job's wait. No-op when the job is not in flight. */
  abort(id: string): void {
    this.inflight.get(id)?.abort();
  }

  abortAll(): void {
    for (const controller of this.inflight.values()) controller.abort();
  }

  private async run(id: string, signal: AbortSignal): Promise<void> {
    await nextTurn();
    if (signal.aborted) {
      this.commitCancelled(id);
      return;
    }
    if (!this.commit(id, () => ({ state: "running" }))) return;

    const { mode } = this.store.get(id);
    const elapsed = await waitFor(latencyFor(mode, this.config.baseLatencyMs), signal);
    if (!elapsed || this.store.get(id).cancelRequested) {
      this.commitCancelled(id);
      return;
    }
    this.commit(id, (current) => this.completionFor(current));
  }

  private completionFor(record: Readonly<JobRecord>): JobTransition {
    switch (record.mode) {
      case "ok":
      case "echo":
      case "slow":
        return {
          state: "ok",
          result: generateResult({ mode: record.mode, op: record.op, args: record.args, seed: this.config.seed }),
        };
      case "fail":
        return { state: "fail", error: { code: "SIM_FAIL", message: this.config.failMessage } };
      case "timeout":
        return { state: "timeout", error: { code: "TIMEOUT", message: "simulated timeout" } };
      case "hang":
        throw new Error(`hang job ${record.id} cannot complete`);
    }
  }

  private commitCancelled(id: string): void {
    this.commit(id, (current) => ({
      state: "cancelled",
      error: {
        code: "CANCELLED",
        message: current.cancelRequested ? "cancelled by client" : "cancelled on shutdown",
      },
    }));
  }

  /** False when the job already reached a terminal state (an expected race). */
  private commit(id: string, mutate: (current: Readonly<JobRecord>) => JobTransition): boolean {
    try {
      this.store.transition(id, mutate);
      return true;
    } catch (e) {
      if (e instanceof AlreadyTerminalError) {
        debugLog(`[JobExecutor] ${id}: lost race, already ${e.state}`);
        return false;
      }
      throw e;
    }
  }
}
