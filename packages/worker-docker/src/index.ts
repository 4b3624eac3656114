export type { DockerWorkerDriverOptions } from "./docker-worker-driver.js";
export { DockerWorkerDriver, createDockerWorkerDriver, buildContainerOptions } from "./docker-worker-driver.js";
export type { DockerApi, DockerContainerApi, DockerodeApiOptions, ContainerCreateOptions } from "./docker-api.js";
export { createDockerodeApi } from "./docker-api.js";
