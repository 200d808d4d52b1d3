/**
 * Job simulator public API.
 */

export * from "./types.js";
export * from "./errors.js";
export { SeededDrawSource, drawAt, mix32, type DrawSource } from "./drawSource.js";
export { resolveMode, pickWeighted, EQUAL_FLAKY_SPLIT } from "./modeResolver.js";
export {
  createSimulatorConfig,
  loadSimulatorConfig,
  parseModeWeights,
  parseFlakySplit,
  getPort,
  SimulatorConfigSchema,
} from "./config.js";
export { JobStore, MonotonicClock, type Clock, type JobTransition } from "./jobStore.js";
export { JobExecutor, latencyFor, waitFor } from "./jobExecutor.js";
export { generateResult, generateReply, canonicalEcho, countTokens } from "./responseGenerator.js";
export { JobSimulator, generateJobId, DEFAULT_JOB_TIMEOUT_MS, type JobSimulatorOptions } from "./jobSimulator.js";
