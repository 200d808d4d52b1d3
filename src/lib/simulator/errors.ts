/**
 * Operational errors raised by the job store and simulator.
 * Simulated outcomes (SIM_FAIL, TIMEOUT, CANCELLED) are never thrown; they live on JobRecord.error.
 */

import type { JobState } from "./types.js";

export enum SimulatorErrorCode {
  NOT_FOUND = "NOT_FOUND",
  ALREADY_TERMINAL = "ALREADY_TERMINAL",
  DUPLICATE_ID = "DUPLICATE_ID",
  INVALID_TRANSITION = "INVALID_TRANSITION",
  INVALID_ARGS = "INVALID_ARGS",
}

/**
 * Base class for operational errors
 */
export class SimulatorError extends Error {
  name = "SimulatorError";

  /**
   * Stable machine-readable error code
   */
  code: SimulatorErrorCode | string = "";
}

/**
 * Unknown job id
 */
export class NotFoundError extends SimulatorError {
  name = "NotFoundError";
  code = SimulatorErrorCode.NOT_FOUND;

  constructor(readonly jobId: string) {
    super(`job not found: ${jobId}`);
  }
}

/**
 * Mutation attempted on a job that already reached ok, fail, timeout or cancelled
 */
export class AlreadyTerminalError extends SimulatorError {
  name = "AlreadyTerminalError";
  code = SimulatorErrorCode.ALREADY_TERMINAL;

  constructor(
    readonly jobId: string,
    readonly state: JobState
  ) {
    super(`job ${jobId} is already terminal (${state})`);
  }
}

export class DuplicateIdError extends SimulatorError {
  name = "DuplicateIdError";
  code = SimulatorErrorCode.DUPLICATE_ID;

  constructor(readonly jobId: string) {
    super(`job id already exists: ${jobId}`);
  }
}

/**
 * Transition outside the state graph, e.g. queued -> ok
 */
export class InvalidTransitionError extends SimulatorError {
  name = "InvalidTransitionError";
  code = SimulatorErrorCode.INVALID_TRANSITION;

  constructor(
    readonly jobId: string,
    readonly from: JobState,
    readonly to: JobState
  ) {
    super(`job ${jobId}: invalid transition ${from} -> ${to}`);
  }
}

/**
 * Job args that cannot be stored, e.g. ones holding functions
 */
export class InvalidArgsError extends SimulatorError {
  name = "InvalidArgsError";
  code = SimulatorErrorCode.INVALID_ARGS;

  constructor(readonly reason: string) {
    super(`job args cannot be stored: ${reason}`);
  }
}
