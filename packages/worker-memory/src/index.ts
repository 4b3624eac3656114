export type { MemoryWorker, MemoryWorkerDriverOptions } from "./memory-worker-driver.js";
export { MemoryWorkerDriver, createMemoryWorkerDriver } from "./memory-worker-driver.js";
