export type { MemorySessionRegistryOptions } from "./memory-session-registry.js";
export { MemorySessionRegistry, createMemorySessionRegistry } from "./memory-session-registry.js";
