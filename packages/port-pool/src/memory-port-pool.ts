import {
  createPortExhaustedError,
  err,
  ok,
  type PortAllocatorPort,
  type PortExhaustedError,
  type Result,
} from "@shellpass/contracts";

export interface MemoryPortPoolOptions {
  readonly basePort: number;
  readonly size: number;
}

const MAX_PORT = 65535;

/**
 * Fixed pool of `size` consecutive ports starting at `basePort`. Acquisition always
 * returns the lowest free port so reuse after release is predictable.
 */
export class MemoryPortPool implements PortAllocatorPort {
  private readonly ports: ReadonlyArray<number>;
  private readonly held = new Set<number>();

  constructor(options: MemoryPortPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Port pool size must be a positive integer, received ${options.size}`);
    }
    if (!Number.isInteger(options.basePort) || options.basePort < 1 || options.basePort + options.size - 1 > MAX_PORT) {
      throw new RangeError(`Port range ${options.basePort}-${options.basePort + options.size - 1} is not valid`);
    }

    this.ports = Array.from({ length: options.size }, (_, index) => options.basePort + index);
  }

  acquire(): Result<number, PortExhaustedError> {
    for (const port of this.ports) {
      if (!this.held.has(port)) {
        this.held.add(port);
        return ok(port);
      }
    }
    return err(createPortExhaustedError(this.ports.length));
  }

  release(port: number): void {
    this.held.delete(port);
  }

  isHeld(port: number): boolean {
    return this.held.has(port);
  }

  available(): number {
    return this.ports.length - this.held.size;
  }

  size(): number {
    return this.ports.length;
  }
}

export const createMemoryPortPool = (options: MemoryPortPoolOptions): MemoryPortPool => new MemoryPortPool(options);
