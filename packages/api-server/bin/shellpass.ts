#!/usr/bin/env -S npx tsx
import { Command, InvalidArgumentError } from "commander";
import { stringify as stringifyYaml } from "yaml";

import { loadConfig, loadConfigFile, maskConfig, type ShellpassConfig } from "../src/config.js";
import { handleShutdownSignals, startServer } from "../src/serve.js";

const program = new Command();

const DRIVERS = ["docker", "memory"] as const;
type DriverName = (typeof DRIVERS)[number];

type ConfigFlags = {
  readonly config?: string;
  readonly port?: number;
  readonly driver?: DriverName;
};

const parsePort = (value: string): number => {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Expected a port between 0 and 65535.");
  }
  return port;
};

const parseDriver = (value: string): DriverName => {
  const driver = DRIVERS.find((candidate) => candidate === value);
  if (!driver) {
    throw new InvalidArgumentError(`Expected one of: ${DRIVERS.join(", ")}`);
  }
  return driver;
};

const resolveConfig = async (flags: ConfigFlags): Promise<ShellpassConfig> => {
  const file = flags.config ? await loadConfigFile(flags.config) : undefined;
  const loaded = loadConfig({
    env: process.env,
    file,
    overrides: { port: flags.port, driver: flags.driver },
  });
  if (!loaded.ok) {
    throw new Error(loaded.error.message);
  }
  return loaded.value;
};

program.name("shellpass").description("Hand out short-lived terminal sessions backed by isolated workers");

program
  .command("serve")
  .description("Start the HTTP API and the lifecycle sweep")
  .option("-c, --config <path>", "Path to a YAML or JSON config file", process.env.SHELLPASS_CONFIG)
  .option("-p, --port <port>", "Port to listen on", parsePort)
  .option("--driver <driver>", "Worker driver (docker|memory)", parseDriver)
  .action(async (flags: ConfigFlags) => {
    const config = await resolveConfig(flags);
    const running = await startServer(config);
    handleShutdownSignals(running);
  });

program
  .command("config")
  .description("Print the resolved configuration with secrets masked")
  .option("-c, --config <path>", "Path to a YAML or JSON config file", process.env.SHELLPASS_CONFIG)
  .option("-p, --port <port>", "Port to listen on", parsePort)
  .option("--driver <driver>", "Worker driver (docker|memory)", parseDriver)
  .action(async (flags: ConfigFlags) => {
    const config = await resolveConfig(flags);
    console.log(stringifyYaml(maskConfig(config)));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
