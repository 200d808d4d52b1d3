/**
 * In-memory job store. All mutations are synchronous, so each check-then-commit
 * is atomic on the event loop; `transition` is the single place that enforces
 * "first terminal transition wins".
 */

// ─── src/lib/simulator/jobStore.ts ───────────────────────────────────────────

import { AlreadyTerminalError, DuplicateIdError, InvalidTransitionError, NotFoundError } from "./errors.js";
import { isTerminal, type JobError, type JobRecord, type JobResult, type JobState } from "./types.js";

export type JobTransition =
  | { state: "running" }
  | { state: "ok"; result: JobResult }
  | { state: "fail" | "timeout" | "cancelled"; error: JobError };

export type TransitionListener = (record: JobRecord, from: JobState) => void;

export interface Clock {
  now(): number;
}

/** Epoch-ms clock that never returns the same value twice. */
export class MonotonicClock implements Clock {
  private last = 0;

  now(): number {
    const t = Math.max(Date.now(), this.last + 1);
    this.last = t;
    return t;
  }
}

const ALLOWED_TRANSITIONS: Readonly<Record<JobState, readonly JobState[]>> = {
  queued: ["running", "cancelled"],
  running: ["ok", "fail", "timeout", "cancelled"],
  ok: [],
  fail: [],
  timeout: [],
  cancelled: [],
};

export type NewJobRecord = Omit<JobRecord, "state" | "createdAt" | "updatedAt" | "cancelRequested" | "result" | "error">;

export interface JobStoreOptions {
  clock?: Clock;
  /** Called after every committed transition with a snapshot of the record. */
  onTransition?: TransitionListener;
}

function snapshot(record: JobRecord): JobRecord {
  return structuredClone(record);
}

export class JobStore {
  private jobs = new Map<string, JobRecord>();
  private readonly clock: Clock;
  private readonly onTransition?: TransitionListener;

  constructor(options: JobStoreOptions = {}) {
    this.clock = options.clock ?? new MonotonicClock();
    this.onTransition = options.onTransition;
  }

  create(input: NewJobRecord): string {
    if (this.jobs.has(input.id)) throw new DuplicateIdError(input.id);
    const now = this.clock.now();
    this.jobs.set(input.id, {
      ...structuredClone(input),
      state: "queued",
      createdAt: now,
      updatedAt: now,
      cancelRequested: false,
    });
    return input.id;
  }

  get(id: string): JobRecord {
    return snapshot(this.require(id));
  }

  has(id: string): boolean {
    return this.jobs.has(id);
  }

  list(): JobRecord[] {
    return [...this.jobs.values()].map(snapshot);
  }

  transition(id: string, mutate: (current: Readonly<JobRecord>) => JobTransition): JobRecord {
    const record = this.require(id);
    if (isTerminal(record.state)) throw new AlreadyTerminalError(id, record.state);
    const next = mutate(snapshot(record));
    if (!ALLOWED_TRANSITIONS[record.state].includes(next.state)) {
      throw new InvalidTransitionError(id, record.state, next.state);
    }
    const from = record.state;
    record.state = next.state;
    record.updatedAt = this.clock.now();
    if (next.state === "ok") record.result = structuredClone(next.result);
    else if (next.state !== "running") record.error = { ...next.error };
    const committed = snapshot(record);
    if (this.onTransition) {
      try {
        this.onTransition(snapshot(committed), from);
      } catch (e) {
        console.error(`[JobStore] transition listener failed for ${id}:`, e instanceof Error ? e.message : e);
      }
    }
    return committed;
  }

  requestCancel(id: string): JobRecord {
    const record = this.require(id);
    if (isTerminal(record.state)) throw new AlreadyTerminalError(id, record.state);
    record.cancelRequested = true;
    return snapshot(record);
  }

  private require(id: string): JobRecord {
    const record = this.jobs.get(id);
    if (!record) throw new NotFoundError(id);
    return record;
  }
}
