import type { DomainError, InfraError } from "../types/domain-error.js";
import { ShellpassErrorCodes } from "./codes.js";

export interface CapacityExceededError extends DomainError {
  readonly code: typeof ShellpassErrorCodes.capacityExceeded;
}

export interface NotFoundError extends DomainError {
  readonly code: typeof ShellpassErrorCodes.notFound;
}

export interface PortExhaustedError extends DomainError {
  readonly code: typeof ShellpassErrorCodes.portExhausted;
}

export interface StartFailureError extends InfraError {
  readonly code: typeof ShellpassErrorCodes.startFailed;
}

export interface TeardownFailureError extends InfraError {
  readonly code: typeof ShellpassErrorCodes.stopFailed;
}

export const createError = (
  code: string,
  message: string,
  details?: Record<string, unknown>,
): DomainError => ({
  code,
  message,
  details,
});

export const createInfraError = (
  code: string,
  message: string,
  cause: unknown,
  details?: Record<string, unknown>,
): InfraError => ({
  code,
  message,
  details: { ...(details ?? {}), cause: describeCause(cause) },
  retryable: true,
});

export const createCapacityExceededError = (
  details?: Record<string, unknown>,
): CapacityExceededError => ({
  code: ShellpassErrorCodes.capacityExceeded,
  message: "All sessions are currently in use. Please try again in a few minutes.",
  details,
});

export const createNotFoundError = (sessionId: string): NotFoundError => ({
  code: ShellpassErrorCodes.notFound,
  message: "Session not found.",
  details: { sessionId },
});

export const createPortExhaustedError = (poolSize: number): PortExhaustedError => ({
  code: ShellpassErrorCodes.portExhausted,
  message: "No free port left in the pool.",
  details: { poolSize },
});

export const createStartFailureError = (
  message: string,
  cause: unknown,
  details?: Record<string, unknown>,
): StartFailureError => ({
  code: ShellpassErrorCodes.startFailed,
  message,
  details: { ...(details ?? {}), cause: describeCause(cause) },
  retryable: true,
});

export const createTeardownFailureError = (
  workerRef: string,
  cause: unknown,
): TeardownFailureError => ({
  code: ShellpassErrorCodes.stopFailed,
  message: "Worker did not stop.",
  details: { workerRef, cause: describeCause(cause) },
  retryable: true,
});

export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (typeof cause === "object" && cause !== null && "message" in cause && typeof cause.message === "string") {
    return cause.message;
  }
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
};
