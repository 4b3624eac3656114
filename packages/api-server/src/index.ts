export type { ShellpassConfig, ShellpassConfigInput, LoadConfigOptions } from "./config.js";
export { CONFIG_ENV_KEYS, loadConfig, loadConfigFile, maskConfig, shellpassConfigSchema } from "./config.js";

export type {
  ConnectionInfo,
  RequestHandlerMetrics,
  RequestHandlerOptions,
  SessionOrchestratorLike,
  ShellpassRequestHandler,
} from "./request-handler.js";
export { createShellpassRequestHandler } from "./request-handler.js";

export type { NodeListenerOptions, NodeResponseLike } from "./node-adapter.js";
export { createNodeListener, toFetchRequest, writeFetchResponse } from "./node-adapter.js";

export type { FetchLike, HttpClient, HttpRequest, HttpResponse } from "./http-client.js";
export { FetchHttpClient } from "./http-client.js";

export type { SlackNotifierOptions } from "./slack-notifier.js";
export { SlackSessionNotifier, buildSlackMessage, createSlackSessionNotifier } from "./slack-notifier.js";

export type { RuntimeOverrides, ShellpassRuntime } from "./runtime.js";
export { createShellpassRuntime } from "./runtime.js";

export type { RunningServer } from "./serve.js";
export { handleShutdownSignals, startServer } from "./serve.js";
