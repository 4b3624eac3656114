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

export interface SupervisorTelemetryMetrics {
  readonly teardownCounter: ShellpassCounter;
  readonly teardownDuration: ShellpassHistogram;
  readonly sweepCounter: ShellpassCounter;
  readonly sweepDuration: ShellpassHistogram;
}

export interface SupervisorTelemetryOptions {
  readonly instrumentation?: ShellpassInstrumentationOptions;
  readonly tracer?: ShellpassTracer;
  readonly logger?: ShellpassLogger;
  readonly metrics?: Partial<SupervisorTelemetryMetrics>;
}

export interface SupervisorTelemetryContext {
  readonly tracer: ShellpassTracer;
  readonly logger: ShellpassLogger;
  readonly metrics: SupervisorTelemetryMetrics;
  readonly instrumentation: ShellpassInstrumentationOptions;
}

const DEFAULT_INSTRUMENTATION: ShellpassInstrumentationOptions = { name: "supervisor" };

export const createSupervisorTelemetry = (options: SupervisorTelemetryOptions = {}): SupervisorTelemetryContext => {
  const instrumentation: ShellpassInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const tracer = options.tracer ?? getShellpassTracer(instrumentation);
  const logger = options.logger ?? createShellpassLogger({ name: instrumentation.name ?? "supervisor" });
  const metrics: SupervisorTelemetryMetrics = {
    teardownCounter:
      options.metrics?.teardownCounter ??
      createShellpassCounter("shellpass_teardowns_total", {
        description: "Count of session teardowns by cause and outcome.",
        instrumentation,
      }),
    teardownDuration:
      options.metrics?.teardownDuration ??
      createShellpassHistogram("shellpass_teardown_duration_ms", {
        description: "Duration of session teardowns.",
        unit: "ms",
        instrumentation,
      }),
    sweepCounter:
      options.metrics?.sweepCounter ??
      createShellpassCounter("shellpass_sweeps_total", {
        description: "Count of supervisor sweeps.",
        instrumentation,
      }),
    sweepDuration:
      options.metrics?.sweepDuration ??
      createShellpassHistogram("shellpass_sweep_duration_ms", {
        description: "Duration of supervisor sweeps.",
        unit: "ms",
        instrumentation,
      }),
  };

  return { tracer, logger, metrics, instrumentation } satisfies SupervisorTelemetryContext;
};
