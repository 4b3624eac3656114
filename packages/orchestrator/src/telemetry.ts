import {
  createShellpassCounter,
  createShellpassHistogram,
  createShellpassLogger,
  getShellpassTracer,
  type ShellpassCounter,
  type ShellpassHistogram,
  type ShellpassInstrumentationOptions,
  type ShellpassLogger,
  type ShellpassTracer,
} from "@shellpass/telemetry";

export interface OrchestratorTelemetryMetrics {
  readonly sessionsCreated: ShellpassCounter;
  readonly sessionRejections: ShellpassCounter;
  readonly workerStartDuration: ShellpassHistogram;
  readonly leadAppends: ShellpassCounter;
}

export interface OrchestratorTelemetryOptions {
  readonly instrumentation?: ShellpassInstrumentationOptions;
  readonly tracer?: ShellpassTracer;
  readonly logger?: ShellpassLogger;
  readonly metrics?: Partial<OrchestratorTelemetryMetrics>;
}

export interface OrchestratorTelemetryContext {
  readonly tracer: ShellpassTracer;
  readonly logger: ShellpassLogger;
  readonly metrics: OrchestratorTelemetryMetrics;
  readonly instrumentation: ShellpassInstrumentationOptions;
}

const DEFAULT_INSTRUMENTATION: ShellpassInstrumentationOptions = { name: "orchestrator" };

export const createOrchestratorTelemetry = (
  options: OrchestratorTelemetryOptions = {},
): OrchestratorTelemetryContext => {
  const instrumentation: ShellpassInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const tracer = options.tracer ?? getShellpassTracer(instrumentation);
  const logger = options.logger ?? createShellpassLogger({ name: instrumentation.name ?? "orchestrator" });
  const metrics: OrchestratorTelemetryMetrics = {
    sessionsCreated:
      options.metrics?.sessionsCreated ??
      createShellpassCounter("shellpass_sessions_created_total", {
        description: "Count of sessions that reached running.",
        instrumentation,
      }),
    sessionRejections:
      options.metrics?.sessionRejections ??
      createShellpassCounter("shellpass_session_rejections_total", {
        description: "Count of refused session requests by reason.",
        instrumentation,
      }),
    workerStartDuration:
      options.metrics?.workerStartDuration ??
      createShellpassHistogram("shellpass_worker_start_duration_ms", {
        description: "Duration of worker starts.",
        unit: "ms",
        instrumentation,
      }),
    leadAppends:
      options.metrics?.leadAppends ??
      createShellpassCounter("shellpass_lead_appends_total", {
        description: "Count of lead appends by outcome.",
        instrumentation,
      }),
  };

  return { tracer, logger, metrics, instrumentation } satisfies OrchestratorTelemetryContext;
};
