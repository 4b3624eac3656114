export type TimeoutOutcome<T> =
  | { readonly timedOut: false; readonly value: T }
  | { readonly timedOut: true };

/**
 * Races `work` against a timer. The timer is cleared as soon as either side settles and
 * never keeps the process alive. Rejections of `work` propagate unchanged.
 */
export const withTimeout = async <T>(work: Promise<T>, timeoutMs: number): Promise<TimeoutOutcome<T>> => {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<TimeoutOutcome<T>>((resolve) => {
    timer = setTimeout(() => resolve({ timedOut: true }), Math.max(0, timeoutMs));
    timer.unref?.();
  });

  try {
    return await Promise.race([work.then((value): TimeoutOutcome<T> => ({ timedOut: false, value })), timeout]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
};
