import {
  createCapacityExceededError,
  createError,
  createNotFoundError,
  err,
  ok,
  ShellpassErrorCodes,
  systemClock,
  type AdmissionToken,
  type CapacityExceededError,
  type Clock,
  type ExpiringClaim,
  type NewSessionInput,
  type NotFoundError,
  type Result,
  type SessionRecord,
  type SessionRegistryPort,
  type SessionState,
  type ShellpassError,
  type TerminationCause,
  type WorkerRef,
} from "@shellpass/contracts";

export interface MemorySessionRegistryOptions {
  readonly maxConcurrentSessions: number;
  readonly clock?: Clock;
  /** Upper bound on terminated records kept for status lookups. Oldest are dropped first. */
  readonly historyLimit?: number;
}

interface StoredSession {
  readonly id: string;
  readonly email: string;
  readonly port: number;
  readonly createdAt: string;
  readonly expiresAt: string;
  state: SessionState;
  workerRef?: WorkerRef;
  terminatedAt?: string;
  terminationCause?: TerminationCause;
}

const DEFAULT_HISTORY_LIMIT = 1000;

const toRecord = (stored: StoredSession): SessionRecord => ({
  id: stored.id,
  email: stored.email,
  state: stored.state,
  port: stored.port,
  workerRef: stored.workerRef,
  createdAt: stored.createdAt,
  expiresAt: stored.expiresAt,
  terminatedAt: stored.terminatedAt,
  terminationCause: stored.terminationCause,
});

const invalidTransition = (id: string, from: SessionState, to: SessionState): ShellpassError =>
  createError(ShellpassErrorCodes.invalidTransition, `Session cannot move from ${from} to ${to}.`, {
    sessionId: id,
    from,
    to,
  });

/**
 * Canonical in-process session table and admission gate.
 *
 * Sessions in `provisioning`, `running` or `expiring` plus outstanding admission tokens count
 * against `maxConcurrentSessions`. Terminated sessions move to a bounded history so status
 * lookups keep answering until they are purged.
 */
export class MemorySessionRegistry implements SessionRegistryPort {
  private readonly active = new Map<string, StoredSession>();
  private readonly history = new Map<string, SessionRecord>();
  private readonly reservations = new Set<number>();
  private readonly clock: Clock;
  private readonly maxConcurrentSessions: number;
  private readonly historyLimit: number;
  private nextTokenId = 1;

  constructor(options: MemorySessionRegistryOptions) {
    if (!Number.isInteger(options.maxConcurrentSessions) || options.maxConcurrentSessions < 1) {
      throw new RangeError(
        `maxConcurrentSessions must be a positive integer, received ${options.maxConcurrentSessions}`,
      );
    }
    this.maxConcurrentSessions = options.maxConcurrentSessions;
    this.clock = options.clock ?? systemClock;
    this.historyLimit = Math.max(0, options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
  }

  tryAdmit(): Result<AdmissionToken, CapacityExceededError> {
    const active = this.activeCount();
    const reserved = this.reservations.size;
    if (active + reserved >= this.maxConcurrentSessions) {
      return err(
        createCapacityExceededError({
          active,
          reserved,
          maxConcurrentSessions: this.maxConcurrentSessions,
        }),
      );
    }

    const token: AdmissionToken = { id: this.nextTokenId, issuedAt: this.clock.now().toISOString() };
    this.nextTokenId += 1;
    this.reservations.add(token.id);
    return ok(token);
  }

  cancelAdmission(token: AdmissionToken): void {
    this.reservations.delete(token.id);
  }

  insert(token: AdmissionToken, input: NewSessionInput): Result<SessionRecord, ShellpassError> {
    if (!this.reservations.has(token.id)) {
      return err(
        createError(ShellpassErrorCodes.admissionInvalid, "Admission token was already used or cancelled.", {
          tokenId: token.id,
        }),
      );
    }

    if (this.has(input.id)) {
      return err(
        createError(ShellpassErrorCodes.duplicateId, "Session id is already in use.", { sessionId: input.id }),
      );
    }

    const stored: StoredSession = {
      id: input.id,
      email: input.email,
      port: input.port,
      createdAt: input.createdAt,
      expiresAt: input.expiresAt,
      state: "provisioning",
    };

    this.reservations.delete(token.id);
    this.active.set(stored.id, stored);
    return ok(toRecord(stored));
  }

  has(id: string): boolean {
    return this.active.has(id) || this.history.has(id);
  }

  get(id: string): Result<SessionRecord, NotFoundError> {
    const stored = this.active.get(id);
    if (stored) {
      return ok(toRecord(stored));
    }

    const terminated = this.history.get(id);
    if (terminated) {
      return ok({ ...terminated });
    }

    return err(createNotFoundError(id));
  }

  markRunning(id: string, workerRef: WorkerRef): Result<SessionRecord, ShellpassError> {
    const stored = this.active.get(id);
    if (!stored) {
      return err(createNotFoundError(id));
    }
    if (stored.state !== "provisioning") {
      return err(invalidTransition(id, stored.state, "running"));
    }

    stored.state = "running";
    stored.workerRef = workerRef;
    return ok(toRecord(stored));
  }

  markExpiring(id: string, cause: TerminationCause): Result<ExpiringClaim, ShellpassError> {
    const stored = this.active.get(id);
    if (!stored) {
      const terminated = this.history.get(id);
      if (terminated) {
        return ok({ session: { ...terminated }, claimed: false });
      }
      return err(createNotFoundError(id));
    }

    switch (stored.state) {
      case "running":
        stored.state = "expiring";
        stored.terminationCause = cause;
        return ok({ session: toRecord(stored), claimed: true });
      case "expiring":
      case "terminated":
        return ok({ session: toRecord(stored), claimed: false });
      case "provisioning":
        return err(
          createError(ShellpassErrorCodes.notReady, "Session is still starting.", { sessionId: id }),
        );
    }
  }

  markTerminated(id: string, cause: TerminationCause): Result<SessionRecord, ShellpassError> {
    const stored = this.active.get(id);
    if (!stored) {
      const terminated = this.history.get(id);
      if (terminated) {
        return ok({ ...terminated });
      }
      return err(createNotFoundError(id));
    }

    if (stored.state === "terminated") {
      return ok(toRecord(stored));
    }
    if (stored.state === "running") {
      return err(invalidTransition(id, stored.state, "terminated"));
    }

    stored.state = "terminated";
    stored.terminatedAt = this.clock.now().toISOString();
    stored.terminationCause = stored.terminationCause ?? cause;
    return ok(toRecord(stored));
  }

  remove(id: string): Result<SessionRecord, ShellpassError> {
    const stored = this.active.get(id);
    if (!stored) {
      return err(createNotFoundError(id));
    }
    if (stored.state !== "terminated") {
      return err(invalidTransition(id, stored.state, "terminated"));
    }

    this.active.delete(id);
    const record = toRecord(stored);
    this.remember(record);
    return ok({ ...record });
  }

  listActive(): ReadonlyArray<SessionRecord> {
    const sessions: SessionRecord[] = [];
    for (const stored of this.active.values()) {
      if (stored.state !== "terminated") {
        sessions.push(toRecord(stored));
      }
    }
    return sessions;
  }

  activeCount(): number {
    let count = 0;
    for (const stored of this.active.values()) {
      if (stored.state !== "terminated") {
        count += 1;
      }
    }
    return count;
  }

  capacity(): number {
    return this.maxConcurrentSessions;
  }

  purgeTerminated(olderThan: Date): number {
    const cutoff = olderThan.getTime();
    let purged = 0;
    for (const [id, record] of Array.from(this.history.entries())) {
      const terminatedAt = record.terminatedAt ? Date.parse(record.terminatedAt) : Number.NaN;
      if (Number.isNaN(terminatedAt) || terminatedAt < cutoff) {
        this.history.delete(id);
        purged += 1;
      }
    }
    return purged;
  }

  private remember(record: SessionRecord): void {
    if (this.historyLimit === 0) {
      return;
    }

    this.history.set(record.id, record);
    while (this.history.size > this.historyLimit) {
      const oldest = this.history.keys().next();
      if (oldest.done) {
        break;
      }
      this.history.delete(oldest.value);
    }
  }
}

export const createMemorySessionRegistry = (options: MemorySessionRegistryOptions): MemorySessionRegistry =>
  new MemorySessionRegistry(options);
