import { createServer, type Server } from "node:http";

import type { ShellpassConfig } from "./config.js";
import { createNodeListener } from "./node-adapter.js";
import { createShellpassRuntime, type RuntimeOverrides, type ShellpassRuntime } from "./runtime.js";

export interface RunningServer {
  readonly server: Server;
  readonly runtime: ShellpassRuntime;
  /** Port the server is bound to; differs from the config when it asked for port 0. */
  readonly port: number;
  close(): Promise<void>;
}

const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

export const startServer = async (
  config: ShellpassConfig,
  overrides: RuntimeOverrides = {},
): Promise<RunningServer> => {
  const runtime = createShellpassRuntime(config, overrides);
  const server = createServer(createNodeListener(runtime.handler, { logger: runtime.logger }));

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : config.port;

  runtime.supervisor.start();
  runtime.logger.info("server.listening", {
    host: config.host,
    port,
    driver: config.driver,
    maxConcurrentSessions: config.maxConcurrentSessions,
  });

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    if (!closing) {
      closing = (async () => {
        await closeServer(server);
        await runtime.close();
      })();
    }
    return closing;
  };

  return { server, runtime, port, close };
};

/** Closes the server on SIGINT/SIGTERM, letting live sessions tear down first. */
export const handleShutdownSignals = (running: RunningServer): void => {
  const onSignal = (signal: NodeJS.Signals) => {
    running.runtime.logger.info("server.shutting_down", { signal });
    void running.close().then(
      () => process.exit(0),
      (error: unknown) => {
        running.runtime.logger.error("server.shutdown_failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      },
    );
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
};
