import { randomBytes } from "node:crypto";

import {
  createCapacityExceededError,
  createError,
  createStartFailureError,
  describeCause,
  err,
  ok,
  ShellpassErrorCodes,
  systemClock,
  withTimeout,
  type AdmissionToken,
  type Clock,
  type LeadStorePort,
  type PortAllocatorPort,
  type Result,
  type SessionNotifierPort,
  type SessionRecord,
  type SessionRegistryPort,
  type ShellpassError,
  type StartFailureError,
  type WorkerDriverPort,
  type WorkerRef,
} from "@shellpass/contracts";
import type { LifecycleSupervisor } from "@shellpass/supervisor";
import { runWithSpan } from "@shellpass/telemetry";

import { DEFAULT_BLOCKED_EMAIL_DOMAINS, normalizeEmail, toDomainSet } from "./email.js";
import {
  createOrchestratorTelemetry,
  type OrchestratorTelemetryContext,
  type OrchestratorTelemetryOptions,
} from "./telemetry.js";
import type {
  CreatedSession,
  CreateSessionInput,
  DeletedSession,
  HealthReport,
  LeadExport,
  SessionStatus,
  TerminalTarget,
} from "./types.js";

export interface SessionOrchestratorDependencies {
  readonly registry: SessionRegistryPort;
  readonly ports: PortAllocatorPort;
  readonly workers: WorkerDriverPort;
  readonly supervisor: LifecycleSupervisor;
  readonly leads: LeadStorePort;
  readonly notifier?: SessionNotifierPort;
}

export interface SessionOrchestratorOptions {
  readonly sessionDurationMs?: number;
  /** Host name handed back to clients alongside the session port. */
  readonly publicHost?: string;
  readonly workerImage?: string;
  readonly workerEnv?: Readonly<Record<string, string>>;
  readonly blockedEmailDomains?: ReadonlyArray<string>;
  readonly inlineTeardownTimeoutMs?: number;
  /** Bound on recording the lead; a slower store is logged and skipped. */
  readonly leadTimeoutMs?: number;
  readonly idFactory?: () => string;
  readonly clock?: Clock;
  readonly telemetry?: OrchestratorTelemetryOptions;
}

const DEFAULTS = {
  sessionDurationMs: 15 * 60_000,
  publicHost: "localhost",
  workerImage: "shellpass/terminal:latest",
  inlineTeardownTimeoutMs: 5_000,
  leadTimeoutMs: 5_000,
} as const;

const MAX_ID_ATTEMPTS = 5;

const generateSessionId = (): string => randomBytes(16).toString("base64url");

const sessionExpired = (sessionId: string): ShellpassError =>
  createError(ShellpassErrorCodes.expired, "Session has expired.", { sessionId });

export class SessionOrchestrator {
  private readonly registry: SessionRegistryPort;
  private readonly ports: PortAllocatorPort;
  private readonly workers: WorkerDriverPort;
  private readonly supervisor: LifecycleSupervisor;
  private readonly leads: LeadStorePort;
  private readonly notifier: SessionNotifierPort | undefined;
  private readonly sessionDurationMs: number;
  private readonly publicHost: string;
  private readonly workerImage: string;
  private readonly workerEnv: Readonly<Record<string, string>>;
  private readonly blockedEmailDomains: ReadonlySet<string>;
  private readonly inlineTeardownTimeoutMs: number;
  private readonly leadTimeoutMs: number;
  private readonly idFactory: () => string;
  private readonly clock: Clock;
  private readonly telemetry: OrchestratorTelemetryContext;

  constructor(dependencies: SessionOrchestratorDependencies, options: SessionOrchestratorOptions = {}) {
    this.registry = dependencies.registry;
    this.ports = dependencies.ports;
    this.workers = dependencies.workers;
    this.supervisor = dependencies.supervisor;
    this.leads = dependencies.leads;
    this.notifier = dependencies.notifier;
    this.sessionDurationMs = options.sessionDurationMs ?? DEFAULTS.sessionDurationMs;
    this.publicHost = options.publicHost ?? DEFAULTS.publicHost;
    this.workerImage = options.workerImage ?? DEFAULTS.workerImage;
    this.workerEnv = options.workerEnv ?? {};
    this.blockedEmailDomains = toDomainSet(options.blockedEmailDomains ?? DEFAULT_BLOCKED_EMAIL_DOMAINS);
    this.inlineTeardownTimeoutMs = options.inlineTeardownTimeoutMs ?? DEFAULTS.inlineTeardownTimeoutMs;
    this.leadTimeoutMs = options.leadTimeoutMs ?? DEFAULTS.leadTimeoutMs;
    this.idFactory = options.idFactory ?? generateSessionId;
    this.clock = options.clock ?? systemClock;
    this.telemetry = createOrchestratorTelemetry(options.telemetry);
  }

  async createSession(input: CreateSessionInput): Promise<Result<CreatedSession, ShellpassError>> {
    return runWithSpan(
      this.telemetry.tracer,
      "orchestrator.create_session",
      async (span): Promise<Result<CreatedSession, ShellpassError>> => {
        const email = normalizeEmail(input.email, this.blockedEmailDomains);
        if (!email.ok) {
          this.reject("invalid_email");
          return email;
        }

        const admission = this.registry.tryAdmit();
        if (!admission.ok) {
          this.reject("capacity");
          this.telemetry.logger.info("orchestrator.capacity_exceeded", { ...admission.error.details });
          return admission;
        }

        const port = this.ports.acquire();
        if (!port.ok) {
          this.registry.cancelAdmission(admission.value);
          this.reject("capacity");
          // Admission passed, so a free port must exist; reaching this is a bookkeeping bug.
          this.telemetry.logger.error("orchestrator.port_exhausted", {
            poolSize: this.ports.size(),
            activeSessions: this.registry.activeCount(),
          });
          return err(createCapacityExceededError({ reason: "port_exhausted" }));
        }

        const inserted = this.insertSession(admission.value, email.value, port.value);
        if (!inserted.ok) {
          this.ports.release(port.value);
          this.registry.cancelAdmission(admission.value);
          this.reject("registry");
          return inserted;
        }

        const session = inserted.value;
        span.setAttribute("session.port", session.port);
        await this.recordLead(session, input.ip);

        const started = await this.startWorker(session);
        if (!started.ok) {
          this.abandon(session);
          this.reject("start_failed");
          return started;
        }

        const running = this.registry.markRunning(session.id, started.value);
        if (!running.ok) {
          try {
            await withTimeout(this.workers.stop(started.value), this.inlineTeardownTimeoutMs);
          } catch (error) {
            this.telemetry.logger.error("orchestrator.rollback_stop_failed", {
              sessionId: session.id,
              workerRef: started.value,
              error: describeCause(error),
            });
          } finally {
            this.abandon(session);
          }
          this.reject("registry");
          return running;
        }

        this.supervisor.track(running.value);
        this.telemetry.metrics.sessionsCreated.add(1);
        this.telemetry.logger.info("orchestrator.session_created", {
          sessionId: session.id,
          port: session.port,
          workerRef: started.value,
          expiresAt: session.expiresAt,
        });
        this.notify(running.value);

        const expiresInSeconds = Math.round(this.sessionDurationMs / 1000);
        return ok({
          sessionId: session.id,
          state: running.value.state,
          host: this.publicHost,
          port: session.port,
          sessionUrl: `/terminal/${session.id}`,
          createdAt: session.createdAt,
          expiresAt: session.expiresAt,
          expiresInSeconds,
          expiresInMinutes: Math.round(expiresInSeconds / 60),
        });
      },
    );
  }

  getSession(id: string): Result<SessionStatus, ShellpassError> {
    const found = this.registry.get(id);
    if (!found.ok) {
      return found;
    }

    const session = found.value;
    const msLeft = Date.parse(session.expiresAt) - this.clock.now().getTime();
    const running = session.state === "running";

    return ok({
      sessionId: session.id,
      state: session.state,
      active: running && msLeft > 0,
      remainingSeconds: running ? Math.max(0, Math.floor(msLeft / 1000)) : 0,
      createdAt: session.createdAt,
      expiresAt: session.expiresAt,
      ...(session.terminatedAt ? { terminatedAt: session.terminatedAt } : {}),
      ...(session.terminationCause ? { terminationCause: session.terminationCause } : {}),
    });
  }

  /**
   * Ends a session early. The teardown runs inline up to `inlineTeardownTimeoutMs`; past that
   * the session is reported as `expiring` and the supervisor finishes it in the background.
   */
  async deleteSession(id: string): Promise<Result<DeletedSession, ShellpassError>> {
    const pending = this.supervisor.expire(id, "deleted");
    const outcome = await withTimeout(pending, this.inlineTeardownTimeoutMs);

    if (outcome.timedOut) {
      this.telemetry.logger.info("orchestrator.teardown_deferred", {
        sessionId: id,
        timeoutMs: this.inlineTeardownTimeoutMs,
      });
      this.watchTeardown(id, pending);
      return ok({ sessionId: id, state: "expiring" });
    }

    const result = outcome.value;
    if (result.ok) {
      return ok({ sessionId: id, state: "terminated" });
    }
    if (result.error.code === ShellpassErrorCodes.stopFailed) {
      // Still expiring; the next sweep retries the teardown.
      return ok({ sessionId: id, state: "expiring" });
    }
    return err(result.error);
  }

  /** Proxy path for a running session's terminal. */
  resolveTerminal(id: string): Result<TerminalTarget, ShellpassError> {
    const found = this.registry.get(id);
    if (!found.ok) {
      return found;
    }

    const session = found.value;
    if (session.state === "provisioning") {
      return err(createError(ShellpassErrorCodes.notReady, "Session is still starting.", { sessionId: id }));
    }
    if (session.state !== "running") {
      return err(sessionExpired(id));
    }
    if (Date.parse(session.expiresAt) <= this.clock.now().getTime()) {
      this.watchTeardown(id, this.supervisor.expire(id, "expired"));
      return err(sessionExpired(id));
    }

    return ok({ sessionId: id, port: session.port, path: `/t/${session.port}/` });
  }

  async exportLeads(): Promise<Result<LeadExport, ShellpassError>> {
    return this.leads.list();
  }

  health(): HealthReport {
    return {
      status: "healthy",
      activeSessions: this.registry.activeCount(),
      maxSessions: this.registry.capacity(),
      availablePorts: this.ports.available(),
    };
  }

  private insertSession(token: AdmissionToken, email: string, port: number): Result<SessionRecord, ShellpassError> {
    const id = this.nextSessionId();
    if (!id.ok) {
      return id;
    }
    const createdAt = this.clock.now();
    const expiresAt = new Date(createdAt.getTime() + this.sessionDurationMs);

    return this.registry.insert(token, {
      id: id.value,
      email,
      port,
      createdAt: createdAt.toISOString(),
      expiresAt: expiresAt.toISOString(),
    });
  }

  private nextSessionId(): Result<string, ShellpassError> {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt += 1) {
      const candidate = this.idFactory();
      if (!this.registry.has(candidate)) {
        return ok(candidate);
      }
    }
    this.telemetry.logger.error("orchestrator.session_id_exhausted", { attempts: MAX_ID_ATTEMPTS });
    return err(
      createError(ShellpassErrorCodes.duplicateId, "Could not allocate a session id.", {
        attempts: MAX_ID_ATTEMPTS,
      }),
    );
  }

  private async startWorker(session: SessionRecord): Promise<Result<WorkerRef, StartFailureError>> {
    const start = performance.now();
    let started: Result<WorkerRef, StartFailureError>;
    try {
      started = await this.workers.start({
        sessionId: session.id,
        port: session.port,
        image: this.workerImage,
        env: this.workerEnv,
      });
    } catch (error) {
      started = err(createStartFailureError("Worker failed to start.", error, { sessionId: session.id }));
    }

    const outcome = started.ok ? "ok" : "error";
    this.telemetry.metrics.workerStartDuration.record(performance.now() - start, { outcome });
    if (!started.ok) {
      this.telemetry.logger.warn("orchestrator.worker_start_failed", {
        sessionId: session.id,
        port: session.port,
        error: started.error.message,
        ...started.error.details,
      });
    }
    return started;
  }

  /** Rolls back a session that never reached `running`. */
  private abandon(session: SessionRecord): void {
    this.ports.release(session.port);
    const terminated = this.registry.markTerminated(session.id, "start_failed");
    if (!terminated.ok) {
      this.telemetry.logger.error("orchestrator.rollback_failed", {
        sessionId: session.id,
        code: terminated.error.code,
      });
      return;
    }
    this.registry.remove(session.id);
  }

  private async recordLead(session: SessionRecord, ip: string | undefined): Promise<void> {
    let outcome: "ok" | "error" | "timeout" = "ok";
    try {
      const pending = this.leads.append({
        email: session.email,
        sessionId: session.id,
        capturedAt: session.createdAt,
        ...(ip ? { ip } : {}),
      });
      const bounded = await withTimeout(pending, this.leadTimeoutMs);
      if (bounded.timedOut) {
        outcome = "timeout";
        this.telemetry.logger.warn("orchestrator.lead_append_timed_out", {
          sessionId: session.id,
          timeoutMs: this.leadTimeoutMs,
        });
        return;
      }
      const appended = bounded.value;
      if (!appended.ok) {
        outcome = "error";
        this.telemetry.logger.warn("orchestrator.lead_append_failed", {
          sessionId: session.id,
          code: appended.error.code,
        });
      }
    } catch (error) {
      outcome = "error";
      this.telemetry.logger.warn("orchestrator.lead_append_failed", {
        sessionId: session.id,
        error: describeCause(error),
      });
    } finally {
      this.telemetry.metrics.leadAppends.add(1, { outcome });
    }
  }

  private notify(session: SessionRecord): void {
    if (!this.notifier) {
      return;
    }

    void this.notifier
      .sessionStarted({ sessionId: session.id, email: session.email, startedAt: this.clock.now().toISOString() })
      .then(
        (result) => {
          if (!result.ok) {
            this.telemetry.logger.warn("orchestrator.notify_failed", {
              sessionId: session.id,
              code: result.error.code,
            });
          }
        },
        (error: unknown) => {
          this.telemetry.logger.warn("orchestrator.notify_failed", {
            sessionId: session.id,
            error: describeCause(error),
          });
        },
      );
  }

  private watchTeardown(id: string, pending: Promise<Result<SessionRecord, ShellpassError>>): void {
    void pending.then(
      (result) => {
        if (!result.ok && result.error.code !== ShellpassErrorCodes.notFound) {
          this.telemetry.logger.warn("orchestrator.background_teardown_failed", {
            sessionId: id,
            code: result.error.code,
          });
        }
      },
      (error: unknown) => {
        this.telemetry.logger.error("orchestrator.background_teardown_failed", {
          sessionId: id,
          error: describeCause(error),
        });
      },
    );
  }

  private reject(reason: string): void {
    this.telemetry.metrics.sessionRejections.add(1, { reason });
  }
}

export const createSessionOrchestrator = (
  dependencies: SessionOrchestratorDependencies,
  options?: SessionOrchestratorOptions,
): SessionOrchestrator => new SessionOrchestrator(dependencies, options);
