import type { StartFailureError, TeardownFailureError } from "../../errors/factories.js";
import type { Result } from "../../types/result.js";
import type { WorkerRef } from "../../types/session.js";

export interface WorkerStartRequest {
  readonly sessionId: string;
  readonly port: number;
  readonly image: string;
  readonly env?: Readonly<Record<string, string>>;
}

/**
 * Starts, probes and force-stops the isolated worker that backs a session.
 *
 * Implementations bound `start` by their own timeout and treat a worker that is already
 * gone as successfully stopped.
 */
export interface WorkerDriverPort {
  start(request: WorkerStartRequest): Promise<Result<WorkerRef, StartFailureError>>;
  isAlive(ref: WorkerRef): Promise<boolean>;
  stop(ref: WorkerRef): Promise<Result<void, TeardownFailureError>>;
}
