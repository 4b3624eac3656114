import Docker from "dockerode";

export type ContainerCreateOptions = Docker.ContainerCreateOptions;

export interface DockerContainerApi {
  readonly id: string;
  start(): Promise<void>;
  isRunning(): Promise<boolean>;
  stop(timeoutSeconds: number): Promise<void>;
  forceRemove(): Promise<void>;
}

/** The slice of the Docker Engine API the driver relies on. */
export interface DockerApi {
  createContainer(options: ContainerCreateOptions): Promise<DockerContainerApi>;
  getContainer(idOrName: string): DockerContainerApi;
}

export interface DockerodeApiOptions {
  readonly docker?: Docker;
  readonly socketPath?: string;
}

const wrapContainer = (container: Docker.Container): DockerContainerApi => ({
  id: container.id,
  async start() {
    await container.start();
  },
  async isRunning() {
    const info = await container.inspect();
    return info.State.Running;
  },
  async stop(timeoutSeconds) {
    await container.stop({ t: timeoutSeconds });
  },
  async forceRemove() {
    await container.remove({ force: true });
  },
});

export const createDockerodeApi = (options: DockerodeApiOptions = {}): DockerApi => {
  const docker = options.docker ?? new Docker(options.socketPath ? { socketPath: options.socketPath } : undefined);
  return {
    async createContainer(createOptions) {
      return wrapContainer(await docker.createContainer(createOptions));
    },
    getContainer(idOrName) {
      return wrapContainer(docker.getContainer(idOrName));
    },
  };
};

/** Status code carried by Docker Engine errors (docker-modem sets `statusCode`). */
export const dockerStatusCode = (error: unknown): number | undefined => {
  if (typeof error === "object" && error !== null && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
};
