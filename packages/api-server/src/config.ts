import { readFile } from "node:fs/promises";
import { extname } from "node:path";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { createError, err, ok, ShellpassErrorCodes, type DomainError, type Result } from "@shellpass/contracts";
import { DEFAULT_BLOCKED_EMAIL_DOMAINS } from "@shellpass/orchestrator";

const MAX_PORT = 65535;

const toDomainList = (value: string | ReadonlyArray<string>): string[] => {
  const entries = typeof value === "string" ? value.split(",") : value;
  return entries.map((entry) => entry.trim().toLowerCase()).filter((entry) => entry.length > 0);
};

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

export const shellpassConfigSchema = z
  .object({
    sessionDurationMinutes: z.coerce.number().positive().default(15),
    maxConcurrentSessions: z.coerce.number().int().positive().default(10),
    basePort: z.coerce.number().int().min(1).max(MAX_PORT).default(7700),
    publicHost: z.string().trim().min(1).default("localhost"),
    sweepIntervalSeconds: z.coerce.number().positive().default(60),
    workerStartTimeoutMs: z.coerce.number().int().positive().default(15_000),
    workerStartTimeoutCeilingMs: z.coerce.number().int().positive().default(60_000),
    inlineTeardownTimeoutMs: z.coerce.number().int().nonnegative().default(5_000),
    terminatedRetentionMinutes: z.coerce.number().nonnegative().default(60),
    workerImage: z.string().trim().min(1).default("shellpass/terminal:latest"),
    workerMemoryMb: z.coerce.number().positive().default(512),
    workerCpus: z.coerce.number().positive().default(0.5),
    blockedEmailDomains: z
      .union([z.string(), z.array(z.string())])
      .transform(toDomainList)
      .default([...DEFAULT_BLOCKED_EMAIL_DOMAINS]),
    adminSecret: optionalText,
    slackWebhookUrl: optionalText.pipe(z.string().url().optional()),
    databaseUrl: optionalText,
    driver: z.enum(["docker", "memory"]).default("docker"),
    port: z.coerce.number().int().min(0).max(MAX_PORT).default(8080),
    host: z.string().trim().min(1).default("0.0.0.0"),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .superRefine((config, context) => {
    const lastPort = config.basePort + config.maxConcurrentSessions - 1;
    if (lastPort > MAX_PORT) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["basePort"],
        message: `Worker ports ${config.basePort}-${lastPort} exceed ${MAX_PORT}.`,
      });
    }
    if (config.workerStartTimeoutMs > config.workerStartTimeoutCeilingMs) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["workerStartTimeoutMs"],
        message: `Worker start timeout ${config.workerStartTimeoutMs}ms exceeds the ceiling of ${config.workerStartTimeoutCeilingMs}ms.`,
      });
    }
  });

export type ShellpassConfig = z.output<typeof shellpassConfigSchema>;
export type ShellpassConfigInput = z.input<typeof shellpassConfigSchema>;
type ConfigKey = keyof ShellpassConfig;

/** Environment variable feeding each configuration key. */
export const CONFIG_ENV_KEYS: Readonly<Partial<Record<ConfigKey, string>>> = {
  sessionDurationMinutes: "SESSION_DURATION_MINUTES",
  maxConcurrentSessions: "MAX_CONCURRENT_SESSIONS",
  basePort: "WORKER_BASE_PORT",
  publicHost: "PUBLIC_HOST",
  sweepIntervalSeconds: "SWEEP_INTERVAL_SECONDS",
  workerStartTimeoutMs: "WORKER_START_TIMEOUT_MS",
  inlineTeardownTimeoutMs: "INLINE_TEARDOWN_TIMEOUT_MS",
  terminatedRetentionMinutes: "TERMINATED_RETENTION_MINUTES",
  workerImage: "DEMO_IMAGE",
  workerMemoryMb: "WORKER_MEMORY_MB",
  workerCpus: "WORKER_CPUS",
  blockedEmailDomains: "BLOCKED_EMAIL_DOMAINS",
  adminSecret: "ADMIN_SECRET",
  slackWebhookUrl: "SLACK_WEBHOOK_URL",
  databaseUrl: "DATABASE_URL",
  driver: "WORKER_DRIVER",
  port: "PORT",
  host: "HOST",
  logLevel: "LOG_LEVEL",
};

const SECRET_KEYS: ReadonlyArray<ConfigKey> = ["adminSecret", "slackWebhookUrl", "databaseUrl"];

export interface LoadConfigOptions {
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Values from a config file; they win over the environment. */
  readonly file?: Readonly<Record<string, unknown>>;
  /** Command-line flags; they win over everything else. */
  readonly overrides?: Readonly<Record<string, unknown>>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readEnvironment = (env: Readonly<Record<string, string | undefined>>): Record<string, unknown> => {
  const values: Record<string, unknown> = {};
  for (const [key, name] of Object.entries(CONFIG_ENV_KEYS)) {
    const raw = name ? env[name] : undefined;
    if (raw !== undefined && raw !== "") {
      values[key] = raw;
    }
  }
  return values;
};

const withoutUndefined = (values: Readonly<Record<string, unknown>>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));

export const loadConfig = (options: LoadConfigOptions = {}): Result<ShellpassConfig, DomainError> => {
  const merged = {
    ...readEnvironment(options.env ?? {}),
    ...withoutUndefined(options.file ?? {}),
    ...withoutUndefined(options.overrides ?? {}),
  };

  const parsed = shellpassConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    return err(
      createError(ShellpassErrorCodes.configInvalid, `Invalid configuration: ${issues.join("; ")}`, { issues }),
    );
  }
  return ok(parsed.data);
};

const parseConfigFile = (contents: string, format: "json" | "yaml"): unknown =>
  format === "json" ? JSON.parse(contents) : parseYaml(contents);

/** Reads a JSON or YAML config file; an empty file yields no values. */
export const loadConfigFile = async (filePath: string): Promise<Record<string, unknown>> => {
  const contents = await readFile(filePath, "utf8");
  const extension = extname(filePath).toLowerCase();
  const data = parseConfigFile(contents, extension === ".json" ? "json" : "yaml");
  if (data === null || data === undefined) {
    return {};
  }
  if (!isRecord(data)) {
    throw new Error(`Config file ${filePath} must contain a mapping of settings`);
  }
  return data;
};

/** Copy of the config safe to print: secrets are replaced by a marker. */
export const maskConfig = (config: ShellpassConfig): Record<string, unknown> => {
  const masked: Record<string, unknown> = { ...config };
  for (const key of SECRET_KEYS) {
    if (masked[key] !== undefined) {
      masked[key] = "********";
    }
  }
  return masked;
};
