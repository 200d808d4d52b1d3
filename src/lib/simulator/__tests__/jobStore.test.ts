import { describe, it, expect, vi, afterEach } from "vitest";
import { JobStore, MonotonicClock, type Clock, type NewJobRecord } from "../jobStore.js";
import { AlreadyTerminalError, DuplicateIdError, InvalidTransitionError, NotFoundError } from "../errors.js";

class StepClock implements Clock {
  constructor(private t = 1000) {}
  now(): number {
    return this.t++;
  }
}

function newJob(id: string): NewJobRecord {
  return {
    id,
    mode: "ok",
    policy: "ok",
    op: "llm.chat",
    args: { messages: [{ role: "user", content: "Hi" }] },
    timeoutMs: 8000,
    traceId: "trace-1",
  };
}

const RESULT = { text: "done", usage: { promptTokens: 1, completionTokens: 1 } };

describe("JobStore", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("creates jobs in queued state", () => {
    const store = new JobStore({ clock: new StepClock() });
    expect(store.create(newJob("job_a"))).toBe("job_a");
    const job = store.get("job_a");
    expect(job.state).toBe("queued");
    expect(job.createdAt).toBe(1000);
    expect(job.updatedAt).toBe(1000);
    expect(job.cancelRequested).toBe(false);
    expect(job.result).toBeUndefined();
    expect(job.error).toBeUndefined();
  });

  it("rejects duplicate ids", () => {
    const store = new JobStore();
    store.create(newJob("job_a"));
    expect(() => store.create(newJob("job_a"))).toThrow(DuplicateIdError);
  });

  it("throws NotFoundError for unknown ids", () => {
    const store = new JobStore();
    expect(() => store.get("job_missing")).toThrow(NotFoundError);
    expect(() => store.requestCancel("job_missing")).toThrow(NotFoundError);
    expect(() => store.transition("job_missing", () => ({ state: "running" }))).toThrow(NotFoundError);
  });

  it("moves queued -> running -> ok and stamps updatedAt each time", () => {
    const store = new JobStore({ clock: new StepClock() });
    store.create(newJob("job_a"));
    const running = store.transition("job_a", () => ({ state: "running" }));
    expect(running.state).toBe("running");
    expect(running.updatedAt).toBe(1001);
    const done = store.transition("job_a", () => ({ state: "ok", result: RESULT }));
    expect(done.state).toBe("ok");
    expect(done.updatedAt).toBe(1002);
    expect(done.result).toEqual(RESULT);
    expect(done.error).toBeUndefined();
  });

  it("rejects transitions out of a terminal state and leaves the record unchanged", () => {
    const store = new JobStore({ clock: new StepClock() });
    store.create(newJob("job_a"));
    store.transition("job_a", () => ({ state: "running" }));
    store.transition("job_a", () => ({ state: "fail", error: { code: "SIM_FAIL", message: "simulated error" } }));
    const before = store.get("job_a");

    expect(() =>
      store.transition("job_a", () => ({ state: "cancelled", error: { code: "CANCELLED", message: "x" } }))
    ).toThrow(AlreadyTerminalError);
    expect(() => store.requestCancel("job_a")).toThrow(AlreadyTerminalError);
    expect(store.get("job_a")).toEqual(before);
  });

  it("rejects edges outside the state graph", () => {
    const store = new JobStore();
    store.create(newJob("job_a"));
    expect(() => store.transition("job_a", () => ({ state: "ok", result: RESULT }))).toThrow(InvalidTransitionError);
    expect(store.get("job_a").state).toBe("queued");
  });

  it("allows cancelling a queued job directly", () => {
    const store = new JobStore();
    store.create(newJob("job_a"));
    const job = store.transition("job_a", () => ({ state: "cancelled", error: { code: "CANCELLED", message: "x" } }));
    expect(job.state).toBe("cancelled");
    expect(job.error).toEqual({ code: "CANCELLED", message: "x" });
  });

  it("sets the cancel flag idempotently until the job is terminal", () => {
    const store = new JobStore();
    store.create(newJob("job_a"));
    expect(store.requestCancel("job_a").cancelRequested).toBe(true);
    expect(store.requestCancel("job_a").cancelRequested).toBe(true);
    expect(store.get("job_a").state).toBe("queued");
  });

  it("passes the current record to the mutator", () => {
    const store = new JobStore();
    store.create(newJob("job_a"));
    store.requestCancel("job_a");
    const seen: boolean[] = [];
    store.transition("job_a", (current) => {
      seen.push(current.cancelRequested);
      return { state: "running" };
    });
    expect(seen).toEqual([true]);
  });

  it("hands out snapshots", () => {
    const store = new JobStore();
    store.create(newJob("job_a"));
    const copy = store.get("job_a");
    copy.state = "ok";
    copy.args.messages = [];
    expect(store.get("job_a").state).toBe("queued");
    expect(store.get("job_a").args).toEqual({ messages: [{ role: "user", content: "Hi" }] });
  });

  it("notifies the listener after each commit", () => {
    const onTransition = vi.fn();
    const store = new JobStore({ onTransition });
    store.create(newJob("job_a"));
    store.transition("job_a", () => ({ state: "running" }));
    expect(onTransition).toHaveBeenCalledTimes(1);
    expect(onTransition).toHaveBeenCalledWith(expect.objectContaining({ id: "job_a", state: "running" }), "queued");
  });

  it("keeps the commit when the listener throws", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const store = new JobStore({
      onTransition: () => {
        throw new Error("listener down");
      },
    });
    store.create(newJob("job_a"));
    expect(store.transition("job_a", () => ({ state: "running" })).state).toBe("running");
    expect(store.get("job_a").state).toBe("running");
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("transition listener failed for job_a"), "listener down");
  });

  it("lists jobs in creation order", () => {
    const store = new JobStore();
    store.create(newJob("job_b"));
    store.create(newJob("job_a"));
    expect(store.list().map((j) => j.id)).toEqual(["job_b", "job_a"]);
  });
});

describe("MonotonicClock", () => {
  it("never repeats a value", () => {
    const clock = new MonotonicClock();
    const values = Array.from({ length: 100 }, () => clock.now());
    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeGreaterThan(values[i - 1] ?? 0);
    }
  });
});
