import type { ShellpassError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";

export interface SessionStartedNotification {
  readonly sessionId: string;
  readonly email: string;
  readonly startedAt: string;
}

export interface SessionNotifierPort {
  sessionStarted(notification: SessionStartedNotification): Promise<Result<void, ShellpassError>>;
}
