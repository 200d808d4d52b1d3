/**
 * Express app factory. The simulator is passed in and kept on app.locals,
 * so tests and the server each own their instance.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { registerApiRoutes } from "./routes/index.js";
import type { JobSimulator } from "../src/lib/simulator/index.js";

export function createApp(simulator: JobSimulator): Express {
  const app = express();
  app.locals.simulator = simulator;

  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  registerApiRoutes(app);

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: { code: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` } });
  });

  // Malformed JSON bodies land here from express.json().
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" ? err.status : 500;
    res.status(status).json({
      error: {
        code: status === 400 ? "BAD_REQUEST" : "INTERNAL_ERROR",
        message: err instanceof Error ? err.message : "Internal server error",
      },
    });
  });

  return app;
}
