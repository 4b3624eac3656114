import { Pool } from "pg";

import type { LeadStorePort, SessionNotifierPort, WorkerDriverPort } from "@shellpass/contracts";
import { createMemoryLeadStore } from "@shellpass/lead-memory";
import { createPostgresLeadStore } from "@shellpass/lead-postgres";
import { createSessionOrchestrator, type SessionOrchestrator } from "@shellpass/orchestrator";
import { createMemoryPortPool } from "@shellpass/port-pool";
import { createMemorySessionRegistry } from "@shellpass/session-registry";
import { createLifecycleSupervisor, type LifecycleSupervisor, type ShutdownSummary } from "@shellpass/supervisor";
import { createShellpassLogger, type ShellpassLogger } from "@shellpass/telemetry";
import { createDockerWorkerDriver } from "@shellpass/worker-docker";
import { createMemoryWorkerDriver } from "@shellpass/worker-memory";

import type { ShellpassConfig } from "./config.js";
import { createShellpassRequestHandler, type ShellpassRequestHandler } from "./request-handler.js";
import { createSlackSessionNotifier } from "./slack-notifier.js";

export interface RuntimeOverrides {
  readonly workers?: WorkerDriverPort;
  readonly leads?: LeadStorePort;
  readonly notifier?: SessionNotifierPort;
  readonly logger?: ShellpassLogger;
}

export interface ShellpassRuntime {
  readonly config: ShellpassConfig;
  readonly logger: ShellpassLogger;
  readonly orchestrator: SessionOrchestrator;
  readonly supervisor: LifecycleSupervisor;
  readonly handler: ShellpassRequestHandler;
  /** Tears down every live session and releases held connections. */
  close(): Promise<ShutdownSummary>;
}

const DATABASE_CONNECT_TIMEOUT_MS = 5_000;
const DATABASE_QUERY_TIMEOUT_MS = 10_000;

const createWorkerDriver = (config: ShellpassConfig, logger: ShellpassLogger): WorkerDriverPort => {
  if (config.driver === "memory") {
    return createMemoryWorkerDriver({
      startTimeoutMs: config.workerStartTimeoutMs,
      startTimeoutCeilingMs: config.workerStartTimeoutCeilingMs,
    });
  }
  return createDockerWorkerDriver({
    memoryMb: config.workerMemoryMb,
    cpus: config.workerCpus,
    startTimeoutMs: config.workerStartTimeoutMs,
    startTimeoutCeilingMs: config.workerStartTimeoutCeilingMs,
    logger: logger.child({ component: "worker-docker" }),
  });
};

/** Wires every component of the orchestrator from a validated config. */
export const createShellpassRuntime = (
  config: ShellpassConfig,
  overrides: RuntimeOverrides = {},
): ShellpassRuntime => {
  const logger = overrides.logger ?? createShellpassLogger({ name: "shellpass", level: config.logLevel });

  const registry = createMemorySessionRegistry({ maxConcurrentSessions: config.maxConcurrentSessions });
  const ports = createMemoryPortPool({ basePort: config.basePort, size: config.maxConcurrentSessions });
  const workers = overrides.workers ?? createWorkerDriver(config, logger);

  let pool: Pool | undefined;
  let leads: LeadStorePort;
  if (overrides.leads) {
    leads = overrides.leads;
  } else if (config.databaseUrl) {
    pool = new Pool({
      connectionString: config.databaseUrl,
      connectionTimeoutMillis: DATABASE_CONNECT_TIMEOUT_MS,
      query_timeout: DATABASE_QUERY_TIMEOUT_MS,
    });
    leads = createPostgresLeadStore(pool, { logger: logger.child({ component: "lead-postgres" }) });
  } else {
    leads = createMemoryLeadStore();
  }

  const notifier =
    overrides.notifier ??
    (config.slackWebhookUrl
      ? createSlackSessionNotifier({
          webhookUrl: config.slackWebhookUrl,
          logger: logger.child({ component: "slack-notifier" }),
        })
      : undefined);

  const supervisor = createLifecycleSupervisor(
    { registry, ports, workers },
    {
      sweepIntervalMs: config.sweepIntervalSeconds * 1000,
      terminatedRetentionMs: config.terminatedRetentionMinutes * 60_000,
      telemetry: { logger: logger.child({ component: "supervisor" }) },
    },
  );

  const orchestrator = createSessionOrchestrator(
    { registry, ports, workers, supervisor, leads, ...(notifier ? { notifier } : {}) },
    {
      sessionDurationMs: config.sessionDurationMinutes * 60_000,
      publicHost: config.publicHost,
      workerImage: config.workerImage,
      blockedEmailDomains: config.blockedEmailDomains,
      inlineTeardownTimeoutMs: config.inlineTeardownTimeoutMs,
      telemetry: { logger: logger.child({ component: "orchestrator" }) },
    },
  );

  const handler = createShellpassRequestHandler(orchestrator, {
    adminSecret: config.adminSecret,
    logger: logger.child({ component: "api" }),
  });

  return {
    config,
    logger,
    orchestrator,
    supervisor,
    handler,
    async close() {
      const summary = await supervisor.shutdown();
      if (pool) {
        await pool.end();
      }
      logger.info("runtime.closed", { ...summary });
      return summary;
    },
  };
};
