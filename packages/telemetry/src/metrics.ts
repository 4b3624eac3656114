import { metrics, type Meter, type MeterOptions, type MetricOptions } from "@opentelemetry/api";

export interface ShellpassInstrumentationOptions extends MeterOptions {
  readonly name?: string;
  readonly version?: string;
}

const DEFAULT_INSTRUMENTATION_NAME = "shellpass";

export const getShellpassMeter = (options: ShellpassInstrumentationOptions = {}): Meter =>
  metrics.getMeter(options.name ?? DEFAULT_INSTRUMENTATION_NAME, options.version, {
    schemaUrl: options.schemaUrl,
  });

export interface ShellpassCounterOptions extends MetricOptions {
  readonly instrumentation?: ShellpassInstrumentationOptions;
}

export const createShellpassCounter = (name: string, options: ShellpassCounterOptions = {}) => {
  const { instrumentation, ...counterOptions } = options;
  return getShellpassMeter(instrumentation).createCounter(name, counterOptions);
};

export interface ShellpassHistogramOptions extends MetricOptions {
  readonly instrumentation?: ShellpassInstrumentationOptions;
}

export const createShellpassHistogram = (name: string, options: ShellpassHistogramOptions = {}) => {
  const { instrumentation, ...histogramOptions } = options;
  return getShellpassMeter(instrumentation).createHistogram(name, histogramOptions);
};

export type ShellpassCounter = ReturnType<typeof createShellpassCounter>;
export type ShellpassHistogram = ReturnType<typeof createShellpassHistogram>;
