/**
 * Job simulator types: modes, policies, job records and configuration.
 */

export type JobState = "queued" | "running" | "ok" | "fail" | "timeout" | "cancelled";
export type TerminalState = "ok" | "fail" | "timeout" | "cancelled";

/** Concrete behavior assigned to a job. */
export type JobMode = "ok" | "echo" | "slow" | "fail" | "hang" | "timeout";

/** Global policy: a fixed mode, or a per-job choice. */
export type ModePolicy = JobMode | "flaky" | "random";

/** Modes that may carry weight in random selection, in canonical order. */
export type WeightedMode = JobMode | "flaky";
export const WEIGHTED_MODES: readonly WeightedMode[] = ["ok", "echo", "slow", "fail", "hang", "timeout", "flaky"];

export type FlakyMode = "ok" | "fail" | "hang";
export const FLAKY_MODES: readonly FlakyMode[] = ["ok", "fail", "hang"];

export const MODE_POLICIES: readonly ModePolicy[] = [
  "ok",
  "echo",
  "slow",
  "fail",
  "hang",
  "timeout",
  "flaky",
  "random",
];

export type ModeWeights = Record<WeightedMode, number>;
export type FlakySplit = Record<FlakyMode, number>;

export function isTerminal(state: JobState): state is TerminalState {
  return state === "ok" || state === "fail" || state === "timeout" || state === "cancelled";
}

/** Codes for simulated outcomes. These are data on the record, never thrown. */
export type SimulatedErrorCode = "SIM_FAIL" | "TIMEOUT" | "CANCELLED";

export interface JobError {
  code: SimulatedErrorCode;
  message: string;
}

export interface JobUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface JobResult {
  text: string;
  usage: JobUsage;
}

export interface JobRecord {
  id: string;
  state: JobState;
  mode: JobMode;
  policy: ModePolicy;
  createdAt: number;
  updatedAt: number;
  op: string;
  args: Record<string, unknown>;
  timeoutMs: number;
  traceId: string | null;
  cancelRequested: boolean;
  result?: JobResult;
  error?: JobError;
}

export interface SimulatorConfig {
  policy: ModePolicy;
  weights: ModeWeights;
  flakySplit: FlakySplit;
  baseLatencyMs: number;
  seed: number;
  failMessage: string;
  /** JSONL event log of terminal transitions; unset disables it. */
  logPath?: string;
}

export interface SubmitJobInput {
  op: string;
  args?: Record<string, unknown>;
  timeoutMs?: number;
  traceId?: string | null;
}

/** Debug view of what the simulator received and decided for a job. */
export interface JobInspection {
  op: string;
  args: Record<string, unknown>;
  timeoutMs: number;
  traceId: string | null;
  mode: JobMode;
  policy: ModePolicy;
  baseLatencyMs: number;
  seed: number;
  weights?: ModeWeights;
}

export type JobStateCounts = Record<JobState, number>;

export interface SimulatorHealth {
  policy: ModePolicy;
  baseLatencyMs: number;
  seed: number;
  weights?: ModeWeights;
  jobs: JobStateCounts;
  usage: JobUsage;
}
