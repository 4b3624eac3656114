export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/clock.js";
export * from "./types/session.js";
export * from "./types/lead.js";

export * from "./errors/codes.js";
export * from "./errors/factories.js";

export * from "./ports/workers/worker-driver-port.js";
export * from "./ports/network/port-allocator-port.js";
export * from "./ports/sessions/session-registry-port.js";
export * from "./ports/leads/lead-store-port.js";
export * from "./ports/notifications/session-notifier-port.js";
export * from "./utils/timeout.js";
