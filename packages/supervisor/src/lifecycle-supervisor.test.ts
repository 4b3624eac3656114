import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { Result, SessionRecord, ShellpassError } from "@shellpass/contracts";
import { createMemoryPortPool } from "@shellpass/port-pool";
import { createMemorySessionRegistry } from "@shellpass/session-registry";
import { createSilentLogger } from "@shellpass/telemetry";
import { createMemoryWorkerDriver } from "@shellpass/worker-memory";

import { createLifecycleSupervisor, type LifecycleSupervisorOptions } from "./lifecycle-supervisor.js";

const unwrap = <T>(result: Result<T, ShellpassError>): T => {
  if (!result.ok) {
    throw new Error(`unexpected failure: ${result.error.code}`);
  }
  return result.value;
};

const createHarness = (options: LifecycleSupervisorOptions = {}) => {
  const registry = createMemorySessionRegistry({ maxConcurrentSessions: 3 });
  const ports = createMemoryPortPool({ basePort: 7700, size: 3 });
  const workers = createMemoryWorkerDriver();
  const supervisor = createLifecycleSupervisor(
    { registry, ports, workers },
    {
      sweepIntervalMs: 1_000,
      terminatedRetentionMs: 60_000,
      telemetry: { logger: createSilentLogger() },
      ...options,
    },
  );

  const launch = async (id: string, expiresAt = "2024-05-01T10:15:00.000Z"): Promise<SessionRecord> => {
    const token = unwrap(registry.tryAdmit());
    const port = unwrap(ports.acquire());
    unwrap(
      registry.insert(token, {
        id,
        email: `${id}@acme.test`,
        port,
        createdAt: "2024-05-01T10:00:00.000Z",
        expiresAt,
      }),
    );
    const ref = unwrap(await workers.start({ sessionId: id, port, image: "shellpass/terminal:test" }));
    return unwrap(registry.markRunning(id, ref));
  };

  return { registry, ports, workers, supervisor, launch };
};

describe("LifecycleSupervisor", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-05-01T10:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("stops the worker, releases the port and removes the session", async () => {
    const { registry, ports, workers, supervisor, launch } = createHarness();
    await launch("alpha");

    const result = await supervisor.expire("alpha", "deleted");

    expect(result.ok && result.value).toMatchObject({
      id: "alpha",
      state: "terminated",
      terminationCause: "deleted",
      terminatedAt: "2024-05-01T10:00:00.000Z",
    });
    expect(workers.removed).toEqual(["worker-1"]);
    expect(ports.isHeld(7700)).toBe(false);
    expect(registry.activeCount()).toBe(0);
  });

  it("shares one teardown between concurrent callers", async () => {
    const { workers, supervisor, launch } = createHarness();
    await launch("alpha");
    workers.holdStops();

    const fromDelete = supervisor.expire("alpha", "deleted");
    const fromDeadline = supervisor.expire("alpha", "expired");
    expect(supervisor.isTearingDown("alpha")).toBe(true);
    workers.releaseStops();

    const [first, second] = await Promise.all([fromDelete, fromDeadline]);

    expect(first.ok && first.value.terminationCause).toBe("deleted");
    expect(second.ok && second.value.terminationCause).toBe("deleted");
    expect(workers.stopCalls).toEqual(["worker-1"]);
  });

  it("returns a terminated session unchanged on repeated expiry", async () => {
    const { workers, supervisor, launch } = createHarness();
    await launch("alpha");
    await supervisor.expire("alpha", "deleted");

    const again = await supervisor.expire("alpha", "expired");

    expect(again.ok && again.value.state).toBe("terminated");
    expect(again.ok && again.value.terminationCause).toBe("deleted");
    expect(workers.stopCalls).toHaveLength(1);
  });

  it("keeps the port and retries on the next sweep when the worker does not stop", async () => {
    const { registry, ports, workers, supervisor, launch } = createHarness();
    await launch("alpha");
    workers.failStopsFor("worker-1");

    const failed = await supervisor.expire("alpha", "deleted");

    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error.code).toBe("worker.stop_failed");
    }
    expect(unwrap(registry.get("alpha")).state).toBe("expiring");
    expect(ports.isHeld(7700)).toBe(true);

    const summary = await supervisor.sweepOnce();

    expect(summary).toEqual({ examined: 1, expired: 0, crashed: 0, retried: 1, failed: 0, purged: 0 });
    expect(unwrap(registry.get("alpha")).state).toBe("terminated");
    expect(ports.isHeld(7700)).toBe(false);
  });

  it("finishes the sweep when a liveness check never answers", async () => {
    const { registry, workers, supervisor, launch } = createHarness({ livenessTimeoutMs: 5_000 });
    await launch("alpha");
    await launch("beta");
    workers.hangNextLivenessCheck();
    workers.kill("worker-2");

    const sweep = supervisor.sweepOnce();
    await vi.advanceTimersByTimeAsync(5_000);

    expect(await sweep).toEqual({ examined: 2, expired: 0, crashed: 1, retried: 0, failed: 0, purged: 0 });
    expect(unwrap(registry.get("alpha")).state).toBe("running");
    expect(unwrap(registry.get("beta")).state).toBe("terminated");

    const next = supervisor.sweepOnce();
    expect(next).not.toBe(sweep);
    expect(await next).toEqual({ examined: 1, expired: 0, crashed: 0, retried: 0, failed: 0, purged: 0 });
  });

  it("fails a stop that never finishes and retries it on the next sweep", async () => {
    const { registry, ports, workers, supervisor, launch } = createHarness({ stopTimeoutMs: 3_000 });
    await launch("alpha");
    workers.holdStops();

    const pending = supervisor.expire("alpha", "deleted");
    await vi.advanceTimersByTimeAsync(3_000);
    const failed = await pending;

    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error.code).toBe("worker.stop_failed");
    }
    expect(supervisor.isTearingDown("alpha")).toBe(false);
    expect(unwrap(registry.get("alpha")).state).toBe("expiring");
    expect(ports.isHeld(7700)).toBe(true);

    workers.releaseStops();
    const summary = await supervisor.sweepOnce();

    expect(summary.retried).toBe(1);
    expect(unwrap(registry.get("alpha")).state).toBe("terminated");
    expect(ports.isHeld(7700)).toBe(false);
    expect(workers.stopCalls).toEqual(["worker-1", "worker-1"]);
  });

  it("re-arms a deadline beyond the timer limit instead of expiring early", async () => {
    const { registry, supervisor, launch } = createHarness();
    const session = await launch("alpha", "2024-06-01T10:00:00.000Z");
    supervisor.track(session);

    await vi.advanceTimersByTimeAsync(2_147_483_647);
    expect(unwrap(registry.get("alpha")).state).toBe("running");

    await vi.advanceTimersByTimeAsync(31 * 24 * 60 * 60_000 - 2_147_483_647);
    await vi.waitFor(() => {
      expect(unwrap(registry.get("alpha")).state).toBe("terminated");
    });
  });

  it("refuses to tear down a running session directly", async () => {
    const { supervisor, launch } = createHarness();
    await launch("alpha");

    const result = await supervisor.teardown("alpha");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("session.invalid_transition");
    }
  });

  it("expires running sessions past their deadline during a sweep", async () => {
    const { registry, ports, supervisor, launch } = createHarness();
    await launch("alpha", "2024-05-01T10:15:00.000Z");
    await launch("beta", "2024-05-01T10:30:00.000Z");
    vi.setSystemTime(new Date("2024-05-01T10:16:00.000Z"));

    const summary = await supervisor.sweepOnce();

    expect(summary.expired).toBe(1);
    expect(unwrap(registry.get("alpha")).terminationCause).toBe("expired");
    expect(unwrap(registry.get("beta")).state).toBe("running");
    expect(ports.isHeld(7700)).toBe(false);
    expect(ports.isHeld(7701)).toBe(true);
  });

  it("tears down sessions whose worker died", async () => {
    const { registry, ports, workers, supervisor, launch } = createHarness();
    await launch("alpha");
    workers.kill("worker-1");

    const summary = await supervisor.sweepOnce();

    expect(summary.crashed).toBe(1);
    expect(unwrap(registry.get("alpha")).terminationCause).toBe("crashed");
    expect(ports.available()).toBe(3);
  });

  it("keeps sweeping the other sessions when one teardown fails", async () => {
    const { registry, workers, supervisor, launch } = createHarness();
    await launch("alpha");
    await launch("beta");
    workers.failStopsFor("worker-1");
    vi.setSystemTime(new Date("2024-05-01T10:20:00.000Z"));

    const summary = await supervisor.sweepOnce();

    expect(summary).toMatchObject({ examined: 2, expired: 1, failed: 1 });
    expect(unwrap(registry.get("alpha")).state).toBe("expiring");
    expect(unwrap(registry.get("beta")).state).toBe("terminated");
  });

  it("joins a sweep that is already running", async () => {
    const { workers, supervisor, launch } = createHarness();
    await launch("alpha");
    workers.holdStops();
    vi.setSystemTime(new Date("2024-05-01T10:20:00.000Z"));

    const first = supervisor.sweepOnce();
    const second = supervisor.sweepOnce();
    workers.releaseStops();

    expect(second).toBe(first);
    expect((await first).expired).toBe(1);
    expect(workers.stopCalls).toEqual(["worker-1"]);
  });

  it("purges terminated sessions once they are past retention", async () => {
    const { registry, supervisor, launch } = createHarness();
    await launch("alpha");
    await supervisor.expire("alpha", "deleted");
    vi.setSystemTime(new Date("2024-05-01T10:02:00.000Z"));

    const summary = await supervisor.sweepOnce();

    expect(summary.purged).toBe(1);
    expect(registry.get("alpha").ok).toBe(false);
  });

  it("expires a tracked session when its deadline fires", async () => {
    const { registry, supervisor, launch } = createHarness();
    const session = await launch("alpha", "2024-05-01T10:15:00.000Z");
    supervisor.track(session);

    await vi.advanceTimersByTimeAsync(15 * 60_000);

    await vi.waitFor(() => {
      expect(unwrap(registry.get("alpha")).state).toBe("terminated");
    });
    expect(unwrap(registry.get("alpha")).terminationCause).toBe("expired");
  });

  it("does not fire deadlines after stop", async () => {
    const { registry, supervisor, launch } = createHarness();
    const session = await launch("alpha", "2024-05-01T10:15:00.000Z");
    supervisor.track(session);

    supervisor.stop();
    await vi.advanceTimersByTimeAsync(15 * 60_000);

    expect(unwrap(registry.get("alpha")).state).toBe("running");
  });

  it("sweeps on its interval once started", async () => {
    const { registry, supervisor, launch } = createHarness();
    await launch("alpha", "2024-05-01T10:00:00.500Z");

    supervisor.start();
    await vi.advanceTimersByTimeAsync(1_000);
    supervisor.stop();

    await vi.waitFor(() => {
      expect(unwrap(registry.get("alpha")).state).toBe("terminated");
    });
  });

  it("tears down every running session on shutdown", async () => {
    const { ports, workers, supervisor, launch } = createHarness();
    await launch("alpha");
    await launch("beta");

    const summary = await supervisor.shutdown();

    expect(summary).toEqual({ terminated: 2, failed: 0 });
    expect(workers.list()).toEqual([]);
    expect(ports.available()).toBe(3);
  });
});
