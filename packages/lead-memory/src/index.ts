export type { MemoryLeadStoreOptions } from "./memory-lead-store.js";
export { MemoryLeadStore, createMemoryLeadStore } from "./memory-lead-store.js";
