/**
 * API route registration for Express.
 * Job routes are mounted under /v1 via a dedicated router; /health stays at the root.
 */

import express, { type Express } from "express";
import * as jobs from "./jobs.js";
import * as health from "./health.js";

export function registerApiRoutes(app: Express): void {
  const v1 = express.Router();

  v1.post("/jobs", jobs.jobsPost);
  v1.get("/jobs/:id", jobs.jobGet);
  v1.get("/jobs/:id/request", jobs.jobRequestGet);
  v1.post("/jobs/:id/cancel", jobs.jobCancelPost);

  app.get("/health", health.healthGet);
  app.use("/v1", v1);
}
