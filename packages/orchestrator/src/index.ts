export type { SessionOrchestratorDependencies, SessionOrchestratorOptions } from "./session-orchestrator.js";
export { SessionOrchestrator, createSessionOrchestrator } from "./session-orchestrator.js";

export type {
  CreateSessionInput,
  CreatedSession,
  DeletedSession,
  HealthReport,
  LeadExport,
  SessionStatus,
  TerminalTarget,
} from "./types.js";

export { DEFAULT_BLOCKED_EMAIL_DOMAINS, normalizeEmail, toDomainSet } from "./email.js";

export type {
  OrchestratorTelemetryContext,
  OrchestratorTelemetryMetrics,
  OrchestratorTelemetryOptions,
} from "./telemetry.js";
export { createOrchestratorTelemetry } from "./telemetry.js";
