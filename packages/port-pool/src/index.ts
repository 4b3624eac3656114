export type { MemoryPortPoolOptions } from "./memory-port-pool.js";
export { MemoryPortPool, createMemoryPortPool } from "./memory-port-pool.js";
