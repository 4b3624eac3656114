export const ShellpassErrorCodes = {
  invalidEmail: "session.invalid_email",
  capacityExceeded: "session.capacity_exceeded",
  notFound: "session.not_found",
  notReady: "session.not_ready",
  expired: "session.expired",
  duplicateId: "session.duplicate_id",
  invalidTransition: "session.invalid_transition",
  admissionInvalid: "session.admission_invalid",
  portExhausted: "port.exhausted",
  startFailed: "worker.start_failed",
  stopFailed: "worker.stop_failed",
  leadStoreFailed: "leads.store_failed",
  leadsUnauthorized: "leads.unauthorized",
  notifyFailed: "notifier.delivery_failed",
  configInvalid: "config.invalid",
} as const;

export type ShellpassErrorCode = (typeof ShellpassErrorCodes)[keyof typeof ShellpassErrorCodes];
