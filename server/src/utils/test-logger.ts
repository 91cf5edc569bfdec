/**
 * Logger backed by a MemoryTransport, for asserting on what a component logged.
 */

import { Logger, MemoryTransport } from "@docprime/shared/logging";

export function createTestLogger(component = "test"): { logger: Logger; memory: MemoryTransport } {
  const memory = new MemoryTransport();
  const logger = new Logger({ minLevel: "trace", component, transports: [memory] });
  return { logger, memory };
}
