import { ConfigService } from "@nestjs/config";
import { ConfigurationError } from "../errors";
import { parseDay, startOfUtcDay } from "../utils/dates";
import type { EnvironmentVariables } from "./env.validation";

export const SIMULATION_CONFIG = Symbol("SIMULATION_CONFIG");

export type LogLevelName = "log" | "error" | "warn" | "debug" | "verbose";

export interface SimulationConfig {
  readonly symbols: readonly string[];
  readonly initialCash: number;
  readonly simulationDays: number;
  readonly intervalDays: number;
  readonly endDate: Date;
  readonly priceLookbackDays: number;
  readonly dayPauseMs: number;
  readonly priceApiBaseUrl: string;
  readonly newsApiKey?: string;
  readonly newsApiBaseUrl: string;
  readonly newsFeedUrl?: string;
  readonly openaiApiKey?: string;
  readonly openaiModel: string;
  readonly openaiTemperature: number;
  readonly openaiMaxTokens: number;
  readonly logDir?: string;
  readonly logLevels: readonly LogLevelName[];
}

export const DEFAULT_SYMBOLS = ["AAPL", "MSFT", "GOOG", "AMZN", "TSLA"];

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ["log", "error", "warn", "debug", "verbose"];

type EnvReader = (key: keyof EnvironmentVariables) => unknown;

const text = (value: unknown) => {
  if (value === undefined || value === null) {
    return undefined;
  }
  const trimmed = String(value).trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const numberOr = (value: unknown, fallback: number) => {
  const raw = text(value);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const parseSymbols = (value: string | undefined) =>
  (value ?? "")
    .split(",")
    .map((symbol) => symbol.trim().toUpperCase())
    .filter((symbol, index, array) => symbol.length > 0 && array.indexOf(symbol) === index);

export const parseLogLevels = (value: string | undefined): LogLevelName[] => {
  if (!value) {
    return ["log", "error", "warn"];
  }
  return value
    .split(",")
    .map((level) => level.trim().toLowerCase())
    .filter((level): level is LogLevelName => LOG_LEVEL_NAMES.some((name) => name === level));
};

export function buildSimulationConfig(read: EnvReader, now: Date = new Date()): SimulationConfig {
  const rawSymbols = text(read("SYMBOLS"));
  const symbols = rawSymbols === undefined ? DEFAULT_SYMBOLS : parseSymbols(rawSymbols);
  if (symbols.length === 0) {
    throw new ConfigurationError("SYMBOLS must name at least one symbol");
  }

  const rawEndDate = text(read("SIMULATION_END_DATE"));
  let endDate = startOfUtcDay(now);
  if (rawEndDate !== undefined) {
    const parsed = parseDay(rawEndDate);
    if (!parsed) {
      throw new ConfigurationError(`SIMULATION_END_DATE is not a calendar date: ${rawEndDate}`);
    }
    endDate = parsed;
  }

  return Object.freeze({
    symbols,
    initialCash: numberOr(read("INITIAL_CASH"), 100000),
    simulationDays: numberOr(read("SIMULATION_DAYS"), 1),
    intervalDays: numberOr(read("SIMULATION_INTERVAL_DAYS"), 7),
    endDate,
    priceLookbackDays: numberOr(read("PRICE_LOOKBACK_DAYS"), 0),
    dayPauseMs: numberOr(read("DAY_PAUSE_MS"), 1000),
    priceApiBaseUrl: text(read("PRICE_API_BASE_URL")) ?? "https://query1.finance.yahoo.com",
    newsApiKey: text(read("NEWS_API_KEY")),
    newsApiBaseUrl: text(read("NEWS_API_BASE_URL")) ?? "https://newsapi.org",
    newsFeedUrl: text(read("NEWS_FEED_URL")),
    openaiApiKey: text(read("OPENAI_API_KEY")),
    openaiModel: text(read("OPENAI_MODEL")) ?? "gpt-4o",
    openaiTemperature: numberOr(read("OPENAI_TEMPERATURE"), 0.5),
    openaiMaxTokens: numberOr(read("OPENAI_MAX_TOKENS"), 150),
    logDir: text(read("LOG_DIR")),
    logLevels: parseLogLevels(text(read("LOG_LEVELS"))),
  });
}

export const simulationConfigProvider = {
  provide: SIMULATION_CONFIG,
  inject: [ConfigService],
  useFactory: (config: ConfigService): SimulationConfig => buildSimulationConfig((key) => config.get(key)),
};
