export type {
  LifecycleSupervisorDependencies,
  LifecycleSupervisorOptions,
  SweepSummary,
  ShutdownSummary,
} from "./lifecycle-supervisor.js";
export { LifecycleSupervisor, createLifecycleSupervisor } from "./lifecycle-supervisor.js";

export type {
  SupervisorTelemetryContext,
  SupervisorTelemetryMetrics,
  SupervisorTelemetryOptions,
} from "./telemetry.js";
export { createSupervisorTelemetry } from "./telemetry.js";
