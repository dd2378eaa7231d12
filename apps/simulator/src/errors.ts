/**
 * Fatal errors raised while setting up a simulation run.
 * Collaborator failures during the run never surface as exceptions; they degrade to fallbacks.
 */

export enum SimulationErrorCode {
  CONFIG_INVALID = "CONFIG_INVALID",
  PRICE_HISTORY_UNAVAILABLE = "PRICE_HISTORY_UNAVAILABLE",
}

export class SimulationError extends Error {
  constructor(
    readonly code: SimulationErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SimulationError";
  }
}

export class ConfigurationError extends SimulationError {
  constructor(message: string) {
    super(SimulationErrorCode.CONFIG_INVALID, message);
    this.name = "ConfigurationError";
  }
}

export class PriceHistoryUnavailableError extends SimulationError {
  constructor(
    readonly symbol: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(SimulationErrorCode.PRICE_HISTORY_UNAVAILABLE, `No price history for ${symbol}: ${detail}`, options);
    this.name = "PriceHistoryUnavailableError";
  }
}
