export type {
  ShellpassInstrumentationOptions,
  ShellpassCounterOptions,
  ShellpassHistogramOptions,
  ShellpassCounter,
  ShellpassHistogram,
} from "./metrics.js";
export { getShellpassMeter, createShellpassCounter, createShellpassHistogram } from "./metrics.js";

export type { ShellpassLogger, ShellpassLoggerOptions, ShellpassLogLevel, LogSink } from "./logging.js";
export { createShellpassLogger, createSilentLogger } from "./logging.js";

export type { ShellpassTracer, RunWithSpanOptions } from "./tracing.js";
export { getShellpassTracer, runWithSpan, SpanStatusCode } from "./tracing.js";
