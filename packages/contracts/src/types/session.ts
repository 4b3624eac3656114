export type SessionState = "provisioning" | "running" | "expiring" | "terminated";

/**
 * Why a session left the running state. Recorded for logs and metrics only; every
 * cause goes through the same teardown path.
 */
export type TerminationCause = "expired" | "deleted" | "crashed" | "start_failed";

export type ActiveSessionState = Exclude<SessionState, "terminated">;

export const ACTIVE_SESSION_STATES: ReadonlyArray<ActiveSessionState> = ["provisioning", "running", "expiring"];

export const isActiveState = (state: SessionState): state is ActiveSessionState => state !== "terminated";

/** Opaque handle on the worker backing a session, e.g. a container id. */
export type WorkerRef = string;

export interface SessionRecord {
  readonly id: string;
  readonly email: string;
  readonly state: SessionState;
  readonly port: number;
  readonly workerRef?: WorkerRef;
  readonly createdAt: string;
  readonly expiresAt: string;
  readonly terminatedAt?: string;
  readonly terminationCause?: TerminationCause;
}

export interface NewSessionInput {
  readonly id: string;
  readonly email: string;
  readonly port: number;
  readonly createdAt: string;
  readonly expiresAt: string;
}

/**
 * A reserved admission slot. Issued by the registry, spent by `insert` or handed back
 * through `cancelAdmission`.
 */
export interface AdmissionToken {
  readonly id: number;
  readonly issuedAt: string;
}

export interface ExpiringClaim {
  readonly session: SessionRecord;
  /** True when this call moved the session to `expiring`. */
  readonly claimed: boolean;
}
