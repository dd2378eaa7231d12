import { Logger } from "@nestjs/common";
import type { LoggerService } from "@nestjs/common";

/**
 * Logs a run-ending error. Lines Nest buffered under `bufferLogs` before the context came up are
 * replayed through `logger` first, so a failed start-up still shows what led to it.
 */
export function reportFatal(logger: LoggerService, error: unknown) {
  const err = error instanceof Error ? error : new Error(String(error));
  Logger.overrideLogger(logger);
  Logger.flush();
  logger.error(`Simulation aborted: ${err.message}`, err.stack, "Process");
}
