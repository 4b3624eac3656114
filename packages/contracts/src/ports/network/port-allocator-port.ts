import type { PortExhaustedError } from "../../errors/factories.js";
import type { Result } from "../../types/result.js";

export interface PortAllocatorPort {
  acquire(): Result<number, PortExhaustedError>;
  release(port: number): void;
  isHeld(port: number): boolean;
  available(): number;
  size(): number;
}
