import {
  createStartFailureError,
  createTeardownFailureError,
  describeCause,
  err,
  ok,
  withTimeout,
  type Result,
  type StartFailureError,
  type TeardownFailureError,
  type TimeoutOutcome,
  type WorkerDriverPort,
  type WorkerRef,
  type WorkerStartRequest,
} from "@shellpass/contracts";
import {
  createShellpassLogger,
  getShellpassTracer,
  runWithSpan,
  type ShellpassLogger,
  type ShellpassTracer,
} from "@shellpass/telemetry";

import {
  createDockerodeApi,
  dockerStatusCode,
  type ContainerCreateOptions,
  type DockerApi,
} from "./docker-api.js";

export interface DockerWorkerDriverOptions {
  readonly api?: DockerApi;
  /** Port the terminal listens on inside the container. */
  readonly containerPort?: number;
  readonly memoryMb?: number;
  readonly cpus?: number;
  readonly startTimeoutMs?: number;
  readonly startTimeoutCeilingMs?: number;
  readonly stopTimeoutSeconds?: number;
  readonly namePrefix?: string;
  readonly logger?: ShellpassLogger;
  readonly tracer?: ShellpassTracer;
}

const DEFAULTS = {
  containerPort: 7681,
  memoryMb: 512,
  cpus: 0.5,
  startTimeoutMs: 15_000,
  startTimeoutCeilingMs: 60_000,
  stopTimeoutSeconds: 10,
  namePrefix: "shellpass",
} as const;

const SESSION_LABEL = "shellpass.session";

// 304: already stopped, 404: no such container, 409: removal already in progress
const GONE_STATUS_CODES = new Set([304, 404, 409]);

export interface ContainerOptionsInput {
  readonly request: WorkerStartRequest;
  readonly name: string;
  readonly containerPort: number;
  readonly memoryMb: number;
  readonly cpus: number;
}

export const buildContainerOptions = (input: ContainerOptionsInput): ContainerCreateOptions => {
  const exposed = `${input.containerPort}/tcp`;
  const env = {
    ...(input.request.env ?? {}),
    SESSION_ID: input.request.sessionId,
  };

  return {
    name: input.name,
    Image: input.request.image,
    Env: Object.entries(env).map(([key, value]) => `${key}=${value}`),
    Labels: { [SESSION_LABEL]: input.request.sessionId },
    ExposedPorts: { [exposed]: {} },
    HostConfig: {
      AutoRemove: true,
      Memory: Math.round(input.memoryMb * 1024 * 1024),
      NanoCpus: Math.round(input.cpus * 1e9),
      PortBindings: { [exposed]: [{ HostPort: String(input.request.port) }] },
    },
  };
};

export class DockerWorkerDriver implements WorkerDriverPort {
  private readonly api: DockerApi;
  private readonly containerPort: number;
  private readonly memoryMb: number;
  private readonly cpus: number;
  private readonly startTimeoutMs: number;
  private readonly stopTimeoutSeconds: number;
  private readonly namePrefix: string;
  private readonly logger: ShellpassLogger;
  private readonly tracer: ShellpassTracer;

  constructor(options: DockerWorkerDriverOptions = {}) {
    this.api = options.api ?? createDockerodeApi();
    this.containerPort = options.containerPort ?? DEFAULTS.containerPort;
    this.memoryMb = options.memoryMb ?? DEFAULTS.memoryMb;
    this.cpus = options.cpus ?? DEFAULTS.cpus;
    this.startTimeoutMs = Math.min(
      options.startTimeoutMs ?? DEFAULTS.startTimeoutMs,
      options.startTimeoutCeilingMs ?? DEFAULTS.startTimeoutCeilingMs,
    );
    this.stopTimeoutSeconds = options.stopTimeoutSeconds ?? DEFAULTS.stopTimeoutSeconds;
    this.namePrefix = options.namePrefix ?? DEFAULTS.namePrefix;
    this.logger = options.logger ?? createShellpassLogger({ name: "worker-docker" });
    this.tracer = options.tracer ?? getShellpassTracer({ name: "worker-docker" });
  }

  async start(request: WorkerStartRequest): Promise<Result<WorkerRef, StartFailureError>> {
    const name = this.containerName(request.sessionId);
    return runWithSpan(
      this.tracer,
      "worker_docker.start",
      async (span) => {
        span.setAttribute("worker.container_name", name);
        span.setAttribute("worker.port", request.port);

        const options = buildContainerOptions({
          request,
          name,
          containerPort: this.containerPort,
          memoryMb: this.memoryMb,
          cpus: this.cpus,
        });

        const launch = this.launch(options);
        let outcome: TimeoutOutcome<string>;
        try {
          outcome = await withTimeout(launch.completion, this.startTimeoutMs);
        } catch (error) {
          await this.discard(launch.containerId(), name);
          this.logger.warn("worker_docker.start_failed", {
            sessionId: request.sessionId,
            containerName: name,
            error: describeCause(error),
          });
          return err(
            createStartFailureError("Worker failed to start.", error, {
              sessionId: request.sessionId,
              containerName: name,
            }),
          );
        }

        if (outcome.timedOut) {
          this.discardWhenSettled(launch.completion, name);
          this.logger.warn("worker_docker.start_timed_out", {
            sessionId: request.sessionId,
            containerName: name,
            timeoutMs: this.startTimeoutMs,
          });
          return err(
            createStartFailureError("Worker did not confirm startup in time.", "start timed out", {
              sessionId: request.sessionId,
              containerName: name,
              timeoutMs: this.startTimeoutMs,
            }),
          );
        }

        this.logger.info("worker_docker.started", {
          sessionId: request.sessionId,
          containerId: outcome.value,
          containerName: name,
          port: request.port,
        });
        return ok(outcome.value);
      },
    );
  }

  async isAlive(ref: WorkerRef): Promise<boolean> {
    try {
      return await this.api.getContainer(ref).isRunning();
    } catch (error) {
      if (dockerStatusCode(error) === 404) {
        return false;
      }
      this.logger.warn("worker_docker.inspect_failed", { containerId: ref, error: describeCause(error) });
      return true;
    }
  }

  async stop(ref: WorkerRef): Promise<Result<void, TeardownFailureError>> {
    const container = this.api.getContainer(ref);

    try {
      await container.stop(this.stopTimeoutSeconds);
    } catch (error) {
      if (!this.isGone(error)) {
        this.logger.error("worker_docker.stop_failed", { containerId: ref, error: describeCause(error) });
        return err(createTeardownFailureError(ref, error));
      }
    }

    try {
      await container.forceRemove();
    } catch (error) {
      if (!this.isGone(error)) {
        this.logger.error("worker_docker.remove_failed", { containerId: ref, error: describeCause(error) });
        return err(createTeardownFailureError(ref, error));
      }
    }

    this.logger.debug("worker_docker.stopped", { containerId: ref });
    return ok(undefined);
  }

  private containerName(sessionId: string): string {
    return `${this.namePrefix}-${sessionId.slice(0, 8)}`;
  }

  private launch(options: ContainerCreateOptions): {
    readonly completion: Promise<string>;
    readonly containerId: () => string | undefined;
  } {
    let createdId: string | undefined;
    const completion = (async () => {
      const container = await this.api.createContainer(options);
      createdId = container.id;
      await container.start();
      return container.id;
    })();
    return { completion, containerId: () => createdId };
  }

  private async discard(containerId: string | undefined, name: string): Promise<void> {
    try {
      await this.api.getContainer(containerId ?? name).forceRemove();
    } catch (error) {
      if (!this.isGone(error)) {
        this.logger.error("worker_docker.discard_failed", {
          containerId,
          containerName: name,
          error: describeCause(error),
        });
      }
    }
  }

  /** A start that outlived its timeout may still create a container; remove it once it lands. */
  private discardWhenSettled(completion: Promise<string>, name: string): void {
    void completion.then(
      (containerId) => this.discard(containerId, name),
      () => this.discard(undefined, name),
    );
  }

  private isGone(error: unknown): boolean {
    const status = dockerStatusCode(error);
    return status !== undefined && GONE_STATUS_CODES.has(status);
  }
}

export const createDockerWorkerDriver = (options?: DockerWorkerDriverOptions): DockerWorkerDriver =>
  new DockerWorkerDriver(options);
