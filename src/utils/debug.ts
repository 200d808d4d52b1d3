/**
 * Controlled debug logging for the job simulator.
 * Set JOBSIM_DEBUG=true to enable.
 */

export const JOBSIM_DEBUG = process.env.JOBSIM_DEBUG === "true";

export function debugLog(...args: unknown[]): void {
  if (JOBSIM_DEBUG) {
    console.log(...args);
  }
}
