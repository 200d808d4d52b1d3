/**
 * Express server for the job simulator.
 */

import { createApp } from "./app.js";
import { JobSimulator, getPort, loadSimulatorConfig } from "../src/lib/simulator/index.js";

const config = loadSimulatorConfig();
const simulator = new JobSimulator(config);
const app = createApp(simulator);
const PORT = getPort();

const server = app.listen(PORT, "0.0.0.0", () => {
  const weights = config.policy === "random" ? ` weights=${JSON.stringify(config.weights)}` : "";
  console.log(
    `[Server] jobsim listening on http://0.0.0.0:${PORT} mode=${config.policy} latency_ms=${config.baseLatencyMs} seed=${config.seed}${weights}`
  );
});

function shutdown(signal: string) {
  console.log(`[Server] ${signal} received, cancelling in-flight jobs`);
  simulator
    .close()
    .then(() => {
      server.close(() => process.exit(0));
    })
    .catch((e) => {
      console.error("[Server] shutdown failed:", e);
      process.exit(1);
    });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
