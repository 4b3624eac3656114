import {
  createStartFailureError,
  createTeardownFailureError,
  err,
  ok,
  withTimeout,
  type Result,
  type StartFailureError,
  type TeardownFailureError,
  type WorkerDriverPort,
  type WorkerRef,
  type WorkerStartRequest,
} from "@shellpass/contracts";

export interface MemoryWorkerDriverOptions {
  readonly startTimeoutMs?: number;
  /** Upper bound applied to `startTimeoutMs`. */
  readonly startTimeoutCeilingMs?: number;
  readonly refPrefix?: string;
}

export interface MemoryWorker {
  readonly ref: WorkerRef;
  readonly sessionId: string;
  readonly port: number;
  readonly image: string;
  readonly env: Readonly<Record<string, string>>;
  readonly alive: boolean;
}

interface Deferred {
  readonly promise: Promise<void>;
  readonly resolve: () => void;
}

const createDeferred = (): Deferred => {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

const DEFAULT_START_TIMEOUT_MS = 5_000;
const DEFAULT_START_TIMEOUT_CEILING_MS = 60_000;

/**
 * Worker driver that keeps its "containers" in a map. Used for local runs without a
 * container runtime and as the runtime stand-in in tests; the `fail*`, `hold*` and `kill`
 * helpers inject the failure modes a real runtime produces.
 */
export class MemoryWorkerDriver implements WorkerDriverPort {
  private readonly workers = new Map<WorkerRef, MemoryWorker>();
  private readonly stopFailures = new Map<WorkerRef, number>();
  private readonly startTimeoutMs: number;
  private readonly refPrefix: string;
  private pendingStartFailures = 0;
  private pendingStartHangs = 0;
  private pendingLivenessHangs = 0;
  private stopGate: Deferred | undefined;
  private sequence = 0;

  readonly startCalls: WorkerStartRequest[] = [];
  readonly stopCalls: WorkerRef[] = [];
  readonly removed: WorkerRef[] = [];

  constructor(options: MemoryWorkerDriverOptions = {}) {
    this.startTimeoutMs = Math.min(
      options.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS,
      options.startTimeoutCeilingMs ?? DEFAULT_START_TIMEOUT_CEILING_MS,
    );
    this.refPrefix = options.refPrefix ?? "worker";
  }

  async start(request: WorkerStartRequest): Promise<Result<WorkerRef, StartFailureError>> {
    this.startCalls.push(request);

    if (this.pendingStartFailures > 0) {
      this.pendingStartFailures -= 1;
      return err(
        createStartFailureError("Worker failed to start.", "simulated start failure", {
          sessionId: request.sessionId,
        }),
      );
    }

    if (this.pendingStartHangs > 0) {
      this.pendingStartHangs -= 1;
      const outcome = await withTimeout(new Promise<never>(() => {}), this.startTimeoutMs);
      if (outcome.timedOut) {
        return err(
          createStartFailureError("Worker did not confirm startup in time.", "start timed out", {
            sessionId: request.sessionId,
            timeoutMs: this.startTimeoutMs,
          }),
        );
      }
    }

    this.sequence += 1;
    const ref = `${this.refPrefix}-${this.sequence}`;
    this.workers.set(ref, {
      ref,
      sessionId: request.sessionId,
      port: request.port,
      image: request.image,
      env: { ...(request.env ?? {}) },
      alive: true,
    });
    return ok(ref);
  }

  async isAlive(ref: WorkerRef): Promise<boolean> {
    if (this.pendingLivenessHangs > 0) {
      this.pendingLivenessHangs -= 1;
      return new Promise<boolean>(() => {});
    }
    return this.workers.get(ref)?.alive ?? false;
  }

  async stop(ref: WorkerRef): Promise<Result<void, TeardownFailureError>> {
    this.stopCalls.push(ref);

    if (this.stopGate) {
      await this.stopGate.promise;
    }

    const remainingFailures = this.stopFailures.get(ref) ?? 0;
    if (remainingFailures > 0) {
      this.stopFailures.set(ref, remainingFailures - 1);
      return err(createTeardownFailureError(ref, "simulated stop failure"));
    }

    if (this.workers.delete(ref)) {
      this.removed.push(ref);
    }
    return ok(undefined);
  }

  failNextStart(times = 1): void {
    this.pendingStartFailures += times;
  }

  /** The next start never confirms, so it ends in the driver's start timeout. */
  hangNextStart(times = 1): void {
    this.pendingStartHangs += times;
  }

  /** The next `isAlive` calls never settle, like an inspect request to a wedged daemon. */
  hangNextLivenessCheck(times = 1): void {
    this.pendingLivenessHangs += times;
  }

  failStopsFor(ref: WorkerRef, times = 1): void {
    this.stopFailures.set(ref, (this.stopFailures.get(ref) ?? 0) + times);
  }

  /** Blocks every stop call until `releaseStops` runs. */
  holdStops(): void {
    if (!this.stopGate) {
      this.stopGate = createDeferred();
    }
  }

  releaseStops(): void {
    const gate = this.stopGate;
    this.stopGate = undefined;
    gate?.resolve();
  }

  /** Simulates the runtime killing a worker, e.g. out of memory. */
  kill(ref: WorkerRef): void {
    const worker = this.workers.get(ref);
    if (worker) {
      this.workers.set(ref, { ...worker, alive: false });
    }
  }

  /** Simulates a worker removed behind the driver's back. */
  forget(ref: WorkerRef): void {
    this.workers.delete(ref);
  }

  list(): ReadonlyArray<MemoryWorker> {
    return Array.from(this.workers.values());
  }

  get(ref: WorkerRef): MemoryWorker | undefined {
    return this.workers.get(ref);
  }
}

export const createMemoryWorkerDriver = (options?: MemoryWorkerDriverOptions): MemoryWorkerDriver =>
  new MemoryWorkerDriver(options);
