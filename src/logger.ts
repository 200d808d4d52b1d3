/**
 * JSONL event log. Appends one JSON line per job event, in commit order.
 * Write failures are warned about and never reach the job.
 */

import { mkdir, appendFile } from "fs/promises";
import { dirname } from "path";
import type { JobMode, JobState, ModePolicy, SimulatedErrorCode, JobUsage } from "./lib/simulator/types.js";

export interface JobEvent {
  ts: string;
  jobId: string;
  traceId: string | null;
  op: string;
  mode: JobMode;
  policy: ModePolicy;
  from: JobState;
  state: JobState;
  errorCode?: SimulatedErrorCode;
  usage?: JobUsage;
  durationMs: number;
}

/**
 * Ensures directory exists (mkdir -p), then appends one JSON line.
 */
export async function appendJsonl(path: string, event: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, JSON.stringify(event) + "\n");
}

/** Serializes appends so lines land in the order `write` was called. */
export class JsonlEventLog {
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly path: string) {}

  write(event: JobEvent): void {
    this.tail = this.tail
      .then(() => appendJsonl(this.path, event))
      .catch((e) => {
        console.warn(`[JsonlEventLog] append to ${this.path} failed:`, e instanceof Error ? e.message : e);
      });
  }

  /** Resolves once every pending line has been written (or warned about). */
  flush(): Promise<void> {
    return this.tail;
  }
}
