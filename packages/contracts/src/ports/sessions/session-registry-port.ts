import type { CapacityExceededError, NotFoundError } from "../../errors/factories.js";
import type { ShellpassError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";
import type {
  AdmissionToken,
  ExpiringClaim,
  NewSessionInput,
  SessionRecord,
  TerminationCause,
  WorkerRef,
} from "../../types/session.js";

/**
 * Owns the canonical session records. Every method completes synchronously so that each
 * call is a single critical section on the event loop; returned records are copies.
 */
export interface SessionRegistryPort {
  tryAdmit(): Result<AdmissionToken, CapacityExceededError>;
  cancelAdmission(token: AdmissionToken): void;
  insert(token: AdmissionToken, input: NewSessionInput): Result<SessionRecord, ShellpassError>;
  has(id: string): boolean;
  get(id: string): Result<SessionRecord, NotFoundError>;
  markRunning(id: string, workerRef: WorkerRef): Result<SessionRecord, ShellpassError>;
  markExpiring(id: string, cause: TerminationCause): Result<ExpiringClaim, ShellpassError>;
  markTerminated(id: string, cause: TerminationCause): Result<SessionRecord, ShellpassError>;
  remove(id: string): Result<SessionRecord, ShellpassError>;
  listActive(): ReadonlyArray<SessionRecord>;
  activeCount(): number;
  capacity(): number;
  purgeTerminated(olderThan: Date): number;
}
