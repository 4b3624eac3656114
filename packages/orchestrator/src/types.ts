import type { LeadRecord, SessionState, TerminationCause } from "@shellpass/contracts";

export interface CreateSessionInput {
  readonly email: unknown;
  /** Client address as seen by the HTTP edge, stored with the lead. */
  readonly ip?: string;
}

export interface CreatedSession {
  readonly sessionId: string;
  readonly state: SessionState;
  readonly host: string;
  readonly port: number;
  readonly sessionUrl: string;
  readonly createdAt: string;
  readonly expiresAt: string;
  readonly expiresInSeconds: number;
  readonly expiresInMinutes: number;
}

export interface SessionStatus {
  readonly sessionId: string;
  readonly state: SessionState;
  readonly active: boolean;
  readonly remainingSeconds: number;
  readonly createdAt: string;
  readonly expiresAt: string;
  readonly terminatedAt?: string;
  readonly terminationCause?: TerminationCause;
}

export interface DeletedSession {
  readonly sessionId: string;
  readonly state: Extract<SessionState, "expiring" | "terminated">;
}

export interface TerminalTarget {
  readonly sessionId: string;
  readonly port: number;
  /** Reverse-proxy path of the session's terminal. */
  readonly path: string;
}

export interface HealthReport {
  readonly status: "healthy";
  readonly activeSessions: number;
  readonly maxSessions: number;
  readonly availablePorts: number;
}

export type LeadExport = ReadonlyArray<LeadRecord>;
