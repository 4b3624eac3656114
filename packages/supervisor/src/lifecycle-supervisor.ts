import {
  createError,
  createTeardownFailureError,
  describeCause,
  err,
  ok,
  ShellpassErrorCodes,
  systemClock,
  type Clock,
  type PortAllocatorPort,
  type Result,
  type SessionRecord,
  type SessionRegistryPort,
  type ShellpassError,
  type TeardownFailureError,
  type TerminationCause,
  type WorkerDriverPort,
  type WorkerRef,
  withTimeout,
} from "@shellpass/contracts";
import { runWithSpan } from "@shellpass/telemetry";

import {
  createSupervisorTelemetry,
  type SupervisorTelemetryContext,
  type SupervisorTelemetryOptions,
} from "./telemetry.js";

export interface LifecycleSupervisorDependencies {
  readonly registry: SessionRegistryPort;
  readonly ports: PortAllocatorPort;
  readonly workers: WorkerDriverPort;
}

export interface LifecycleSupervisorOptions {
  readonly clock?: Clock;
  readonly sweepIntervalMs?: number;
  /** How long terminated sessions stay answerable before the sweep purges them. */
  readonly terminatedRetentionMs?: number;
  /** Bound on one `isAlive` call; a worker that takes longer to answer counts as alive. */
  readonly livenessTimeoutMs?: number;
  /** Bound on one worker stop; a stop that takes longer fails and is retried by the next sweep. */
  readonly stopTimeoutMs?: number;
  readonly telemetry?: SupervisorTelemetryOptions;
}

export interface SweepSummary {
  readonly examined: number;
  readonly expired: number;
  readonly crashed: number;
  readonly retried: number;
  readonly failed: number;
  readonly purged: number;
}

export interface ShutdownSummary {
  readonly terminated: number;
  readonly failed: number;
}

type SweepAction = "none" | "expired" | "crashed" | "retried" | "failed";

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;
const DEFAULT_TERMINATED_RETENTION_MS = 60 * 60_000;
const DEFAULT_LIVENESS_TIMEOUT_MS = 10_000;
const DEFAULT_STOP_TIMEOUT_MS = 30_000;
// setTimeout overflows above this and fires immediately
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Drives sessions from `running` to `terminated`.
 *
 * Every exit (deadline, delete, crash, shutdown) ends in {@link teardown}, which stops the
 * worker and then releases the port, marks the session terminated and removes it in one
 * synchronous step. Concurrent callers for the same id share a single in-flight teardown.
 */
export class LifecycleSupervisor {
  private readonly registry: SessionRegistryPort;
  private readonly ports: PortAllocatorPort;
  private readonly workers: WorkerDriverPort;
  private readonly clock: Clock;
  private readonly sweepIntervalMs: number;
  private readonly terminatedRetentionMs: number;
  private readonly livenessTimeoutMs: number;
  private readonly stopTimeoutMs: number;
  private readonly telemetry: SupervisorTelemetryContext;
  private readonly inFlight = new Map<string, Promise<Result<SessionRecord, ShellpassError>>>();
  private readonly deadlines = new Map<string, ReturnType<typeof setTimeout>>();
  private sweepTimer: ReturnType<typeof setInterval> | undefined;
  private currentSweep: Promise<SweepSummary> | undefined;

  constructor(dependencies: LifecycleSupervisorDependencies, options: LifecycleSupervisorOptions = {}) {
    this.registry = dependencies.registry;
    this.ports = dependencies.ports;
    this.workers = dependencies.workers;
    this.clock = options.clock ?? systemClock;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.terminatedRetentionMs = options.terminatedRetentionMs ?? DEFAULT_TERMINATED_RETENTION_MS;
    this.livenessTimeoutMs = options.livenessTimeoutMs ?? DEFAULT_LIVENESS_TIMEOUT_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.telemetry = createSupervisorTelemetry(options.telemetry);
  }

  /** Arms the deadline timer for a session that just reached `running`. */
  track(session: SessionRecord): void {
    this.clearDeadline(session.id);

    const delay = Date.parse(session.expiresAt) - this.clock.now().getTime();
    const timer = setTimeout(() => {
      this.deadlines.delete(session.id);
      if (Date.parse(session.expiresAt) > this.clock.now().getTime()) {
        // Deadlines past the timer limit fire early; wait out the rest.
        this.track(session);
        return;
      }
      this.runDetached(session.id, this.expire(session.id, "expired"));
    }, Math.min(Math.max(0, delay), MAX_TIMER_DELAY_MS));
    timer.unref?.();
    this.deadlines.set(session.id, timer);
  }

  /**
   * Moves a running session to `expiring` with `cause` and tears it down. Sessions already
   * expiring join the teardown in progress; terminated sessions are returned as they are.
   */
  async expire(id: string, cause: TerminationCause): Promise<Result<SessionRecord, ShellpassError>> {
    const claim = this.registry.markExpiring(id, cause);
    if (!claim.ok) {
      return claim;
    }

    const { session, claimed } = claim.value;
    if (session.state === "terminated") {
      return ok(session);
    }

    if (claimed) {
      this.telemetry.logger.info("supervisor.session_expiring", { sessionId: id, cause });
    }
    return this.teardown(id);
  }

  /** Idempotent teardown of an `expiring` session. */
  teardown(id: string): Promise<Result<SessionRecord, ShellpassError>> {
    const existing = this.inFlight.get(id);
    if (existing) {
      return existing;
    }

    const current = this.registry.get(id);
    if (!current.ok) {
      return Promise.resolve(current);
    }

    const session = current.value;
    if (session.state === "terminated") {
      return Promise.resolve(ok(session));
    }
    if (session.state !== "expiring") {
      return Promise.resolve(
        err(
          createError(ShellpassErrorCodes.invalidTransition, "Session must be expiring before teardown.", {
            sessionId: id,
            state: session.state,
          }),
        ),
      );
    }

    const pending = this.runTeardown(session).finally(() => {
      this.inFlight.delete(id);
    });
    this.inFlight.set(id, pending);
    return pending;
  }

  isTearingDown(id: string): boolean {
    return this.inFlight.has(id);
  }

  /**
   * One supervision pass over the active sessions. A pass already running is joined rather
   * than started twice.
   */
  sweepOnce(): Promise<SweepSummary> {
    if (this.currentSweep) {
      return this.currentSweep;
    }

    const sweep = this.runSweep().finally(() => {
      this.currentSweep = undefined;
    });
    this.currentSweep = sweep;
    return sweep;
  }

  start(): void {
    if (this.sweepTimer) {
      return;
    }

    this.sweepTimer = setInterval(() => {
      void this.sweepOnce().catch((error: unknown) => {
        this.telemetry.logger.error("supervisor.sweep_failed", { error: describeCause(error) });
      });
    }, this.sweepIntervalMs);
    this.sweepTimer.unref?.();
    this.telemetry.logger.info("supervisor.started", { sweepIntervalMs: this.sweepIntervalMs });
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
    for (const timer of this.deadlines.values()) {
      clearTimeout(timer);
    }
    this.deadlines.clear();
  }

  /** Stops supervision and tears down every running or expiring session. */
  async shutdown(): Promise<ShutdownSummary> {
    this.stop();

    const sessions = this.registry.listActive().filter((session) => session.state !== "provisioning");
    const results = await Promise.all(
      sessions.map(async (session) => {
        try {
          return await this.expire(session.id, "deleted");
        } catch (error) {
          return err(
            createError(ShellpassErrorCodes.stopFailed, "Teardown threw during shutdown.", {
              sessionId: session.id,
              cause: describeCause(error),
            }),
          );
        }
      }),
    );

    const failed = results.filter((result) => !result.ok).length;
    const summary = { terminated: results.length - failed, failed } satisfies ShutdownSummary;
    this.telemetry.logger.info("supervisor.shutdown_completed", summary);
    return summary;
  }

  private async runTeardown(session: SessionRecord): Promise<Result<SessionRecord, ShellpassError>> {
    const cause = session.terminationCause ?? "deleted";
    const start = performance.now();
    this.clearDeadline(session.id);

    const result = await runWithSpan(
      this.telemetry.tracer,
      "supervisor.teardown",
      async (span): Promise<Result<SessionRecord, ShellpassError>> => {
        span.setAttribute("session.cause", cause);

        if (session.workerRef) {
          const stopped = await this.stopWorker(session.workerRef);
          if (!stopped.ok) {
            this.telemetry.logger.error("supervisor.teardown_failed", {
              sessionId: session.id,
              workerRef: session.workerRef,
              cause,
              error: stopped.error.message,
            });
            return stopped;
          }
        }

        this.ports.release(session.port);
        const terminated = this.registry.markTerminated(session.id, cause);
        if (!terminated.ok) {
          return terminated;
        }
        return this.registry.remove(session.id);
      },
    );

    const outcome = result.ok ? "completed" : "failed";
    const duration = performance.now() - start;
    this.telemetry.metrics.teardownCounter.add(1, { cause, outcome });
    this.telemetry.metrics.teardownDuration.record(duration, { cause, outcome });

    if (result.ok) {
      this.telemetry.logger.info("supervisor.teardown_completed", {
        sessionId: session.id,
        port: session.port,
        cause,
        durationMs: Math.round(duration),
      });
    }
    return result;
  }

  private async runSweep(): Promise<SweepSummary> {
    const start = performance.now();
    const now = this.clock.now();
    const sessions = this.registry.listActive();

    const actions = await Promise.all(sessions.map((session) => this.sweepSession(session, now)));
    const purged = this.registry.purgeTerminated(new Date(now.getTime() - this.terminatedRetentionMs));

    const count = (action: SweepAction) => actions.filter((candidate) => candidate === action).length;
    const summary = {
      examined: sessions.length,
      expired: count("expired"),
      crashed: count("crashed"),
      retried: count("retried"),
      failed: count("failed"),
      purged,
    } satisfies SweepSummary;

    const outcome = summary.failed > 0 ? "partial" : "ok";
    this.telemetry.metrics.sweepCounter.add(1, { outcome });
    this.telemetry.metrics.sweepDuration.record(performance.now() - start, { outcome });
    this.telemetry.logger.debug("supervisor.sweep_completed", summary);
    return summary;
  }

  private async sweepSession(session: SessionRecord, now: Date): Promise<SweepAction> {
    try {
      if (session.state === "running") {
        if (Date.parse(session.expiresAt) <= now.getTime()) {
          return this.settle(session, "expired", await this.expire(session.id, "expired"));
        }
        if (session.workerRef && !(await this.checkLiveness(session.id, session.workerRef))) {
          this.telemetry.logger.warn("supervisor.worker_dead", {
            sessionId: session.id,
            workerRef: session.workerRef,
          });
          return this.settle(session, "crashed", await this.expire(session.id, "crashed"));
        }
        return "none";
      }

      if (session.state === "expiring" && !this.inFlight.has(session.id)) {
        return this.settle(session, "retried", await this.teardown(session.id));
      }
      return "none";
    } catch (error) {
      this.telemetry.logger.error("supervisor.teardown_failed", {
        sessionId: session.id,
        error: describeCause(error),
      });
      return "failed";
    }
  }

  private async checkLiveness(id: string, ref: WorkerRef): Promise<boolean> {
    const check = await withTimeout(this.workers.isAlive(ref), this.livenessTimeoutMs);
    if (check.timedOut) {
      this.telemetry.logger.warn("supervisor.liveness_timed_out", {
        sessionId: id,
        workerRef: ref,
        timeoutMs: this.livenessTimeoutMs,
      });
      return true;
    }
    return check.value;
  }

  private async stopWorker(ref: WorkerRef): Promise<Result<void, TeardownFailureError>> {
    const stop = await withTimeout(this.workers.stop(ref), this.stopTimeoutMs);
    if (stop.timedOut) {
      return err(createTeardownFailureError(ref, `stop did not finish within ${this.stopTimeoutMs}ms`));
    }
    return stop.value;
  }

  private settle(
    session: SessionRecord,
    action: SweepAction,
    result: Result<SessionRecord, ShellpassError>,
  ): SweepAction {
    if (result.ok) {
      return action;
    }
    // A delete or deadline may have finished the session between listing and acting.
    if (result.error.code === ShellpassErrorCodes.notFound) {
      return "none";
    }
    this.telemetry.logger.warn("supervisor.sweep_action_failed", {
      sessionId: session.id,
      action,
      code: result.error.code,
    });
    return "failed";
  }

  private runDetached(id: string, work: Promise<Result<SessionRecord, ShellpassError>>): void {
    void work.then(
      (result) => {
        if (!result.ok && result.error.code !== ShellpassErrorCodes.notFound) {
          this.telemetry.logger.warn("supervisor.deadline_teardown_failed", {
            sessionId: id,
            code: result.error.code,
          });
        }
      },
      (error: unknown) => {
        this.telemetry.logger.error("supervisor.deadline_teardown_failed", {
          sessionId: id,
          error: describeCause(error),
        });
      },
    );
  }

  private clearDeadline(id: string): void {
    const timer = this.deadlines.get(id);
    if (timer) {
      clearTimeout(timer);
      this.deadlines.delete(id);
    }
  }
}

export const createLifecycleSupervisor = (
  dependencies: LifecycleSupervisorDependencies,
  options?: LifecycleSupervisorOptions,
): LifecycleSupervisor => new LifecycleSupervisor(dependencies, options);
