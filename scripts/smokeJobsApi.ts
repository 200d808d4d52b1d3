/**
 * Smoke test for /v1/jobs against a running server.
 * Run with: npx tsx scripts/smokeJobsApi.ts
 * Requires: npm run dev (in another terminal)
 */

import { z } from "zod";

const BASE = process.env.JOBSIM_URL ?? "http://localhost:8000";

const CreatedSchema = z.object({ id: z.string(), state: z.string(), created_at: z.number() });
const StatusSchema = z.object({
  id: z.string(),
  state: z.string(),
  result: z.object({ text: z.string() }).nullable(),
  error: z.object({ code: z.string(), message: z.string() }).nullable(),
});
const ErrorSchema = z.object({ error: z.object({ code: z.string(), message: z.string() }) });

async function call(method: string, path: string, body?: unknown): Promise<unknown> {
  const res = await fetch(`${BASE}${path}`, {
    method,
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const data: unknown = await res.json();
  if (!res.ok) {
    const parsed = ErrorSchema.safeParse(data);
    throw new Error(parsed.success ? `${parsed.data.error.code}: ${parsed.data.error.message}` : `HTTP ${res.status}`);
  }
  return data;
}

async function waitTerminal(id: string, timeoutMs = 10_000) {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const status = StatusSchema.parse(await call("GET", `/v1/jobs/${id}`));
    if (status.state !== "queued" && status.state !== "running") return status;
    if (Date.now() > deadline) return status;
    await new Promise((r) => setTimeout(r, 100));
  }
}

async function main() {
  console.log("--- health ---");
  console.log(await call("GET", "/health"));
  console.log();

  console.log("--- chat job ---");
  const created = CreatedSchema.parse(
    await call("POST", "/v1/jobs", {
      op: "llm.chat",
      args: { messages: [{ role: "user", content: "I feel like testing things" }] },
      trace_id: "smoke-1",
    })
  );
  console.log("Created:", created.id, created.state);
  const done = await waitTerminal(created.id);
  console.log("State:", done.state);
  if (done.result) console.log("Text:", done.result.text);
  if (done.error) console.log("Error:", done.error.code, done.error.message);
  console.log("Request:", await call("GET", `/v1/jobs/${created.id}/request`));
  console.log();

  console.log("--- cancel ---");
  const second = CreatedSchema.parse(await call("POST", "/v1/jobs", { op: "tool.run", args: {} }));
  try {
    console.log(await call("POST", `/v1/jobs/${second.id}/cancel`));
  } catch (e) {
    console.log("Cancel refused:", e instanceof Error ? e.message : e);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
