/**
 * Resolve N job modes with the env config and print how often each came up.
 * Run with: npx tsx scripts/modeHistogram.ts [count]
 * Uses JOBSIM_MODE, JOBSIM_RANDOM_WEIGHTS, JOBSIM_FLAKY_SPLIT and JOBSIM_SEED.
 */

import {
  SeededDrawSource,
  loadSimulatorConfig,
  resolveMode,
  type JobMode,
} from "../src/lib/simulator/index.js";

function main() {
  const count = Math.max(1, parseInt(process.argv[2] ?? "10000", 10) || 10000);
  const config = loadSimulatorConfig();
  const draws = new SeededDrawSource(config.seed);
  const hist = new Map<JobMode, number>();

  for (let i = 0; i < count; i++) {
    const mode = resolveMode(config.policy, config.weights, draws, config.flakySplit);
    hist.set(mode, (hist.get(mode) ?? 0) + 1);
  }

  console.log(`policy=${config.policy} seed=${config.seed} jobs=${count} draws=${draws.count}`);
  const rows = [...hist.entries()].sort((a, b) => b[1] - a[1]);
  for (const [mode, n] of rows) {
    console.log(`${mode.padEnd(8)} ${String(n).padStart(7)}  ${((n / count) * 100).toFixed(2)}%`);
  }
}

main();
