import { afterEach, describe, expect, it, vi } from "vitest";

import { createMemoryWorkerDriver } from "./memory-worker-driver.js";

const request = { sessionId: "sess-1", port: 7700, image: "shellpass/terminal:test" };

describe("MemoryWorkerDriver", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts workers with sequential refs", async () => {
    const driver = createMemoryWorkerDriver();

    const first = await driver.start(request);
    const second = await driver.start({ ...request, sessionId: "sess-2", port: 7701 });

    expect(first).toEqual({ ok: true, value: "worker-1" });
    expect(second).toEqual({ ok: true, value: "worker-2" });
    expect(await driver.isAlive("worker-1")).toBe(true);
  });

  it("fails the next start on request", async () => {
    const driver = createMemoryWorkerDriver();
    driver.failNextStart();

    const failed = await driver.start(request);
    const recovered = await driver.start(request);

    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error.code).toBe("worker.start_failed");
      expect(failed.error.retryable).toBe(true);
    }
    expect(recovered.ok).toBe(true);
  });

  it("turns a hanging start into a timeout failure", async () => {
    vi.useFakeTimers();
    const driver = createMemoryWorkerDriver({ startTimeoutMs: 1_000 });
    driver.hangNextStart();

    const pending = driver.start(request);
    await vi.advanceTimersByTimeAsync(1_000);
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Worker did not confirm startup in time.");
      expect(result.error.details).toEqual({ sessionId: "sess-1", timeoutMs: 1_000, cause: "start timed out" });
    }
    expect(driver.list()).toEqual([]);
  });

  it("treats a worker that is already gone as stopped", async () => {
    const driver = createMemoryWorkerDriver();
    const started = await driver.start(request);
    if (!started.ok) {
      throw new Error("start failed");
    }
    driver.forget(started.value);

    expect(await driver.stop(started.value)).toEqual({ ok: true, value: undefined });
    expect(await driver.isAlive(started.value)).toBe(false);
  });

  it("reports killed workers as dead", async () => {
    const driver = createMemoryWorkerDriver();
    const started = await driver.start(request);
    if (!started.ok) {
      throw new Error("start failed");
    }

    driver.kill(started.value);

    expect(await driver.isAlive(started.value)).toBe(false);
  });

  it("fails stop the requested number of times", async () => {
    const driver = createMemoryWorkerDriver();
    const started = await driver.start(request);
    if (!started.ok) {
      throw new Error("start failed");
    }
    driver.failStopsFor(started.value, 1);

    const first = await driver.stop(started.value);
    const second = await driver.stop(started.value);

    expect(first.ok).toBe(false);
    expect(second.ok).toBe(true);
    expect(driver.removed).toEqual(["worker-1"]);
  });

  it("caps the start timeout at the ceiling", async () => {
    vi.useFakeTimers();
    const driver = createMemoryWorkerDriver({ startTimeoutMs: 5_000, startTimeoutCeilingMs: 2_000 });
    driver.hangNextStart();

    const pending = driver.start(request);
    await vi.advanceTimersByTimeAsync(2_000);
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.details).toMatchObject({ timeoutMs: 2_000 });
    }
  });

  it("leaves a liveness check pending when asked to hang", async () => {
    vi.useFakeTimers();
    const driver = createMemoryWorkerDriver();
    const started = await driver.start(request);
    if (!started.ok) {
      throw new Error("start failed");
    }
    driver.hangNextLivenessCheck();

    let settled = false;
    void driver.isAlive(started.value).then(() => {
      settled = true;
    });
    await vi.advanceTimersByTimeAsync(60_000);

    expect(settled).toBe(false);
    expect(await driver.isAlive(started.value)).toBe(true);
  });
});
