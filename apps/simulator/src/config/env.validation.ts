import { plainToInstance, Type } from "class-transformer";
import {
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  IsUrl,
  Matches,
  Max,
  Min,
  validateSync,
} from "class-validator";
import { ConfigurationError } from "../errors";

export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  SYMBOLS?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  INITIAL_CASH?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SIMULATION_DAYS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SIMULATION_INTERVAL_DAYS?: number;

  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: "SIMULATION_END_DATE must be YYYY-MM-DD" })
  SIMULATION_END_DATE?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  PRICE_LOOKBACK_DAYS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  DAY_PAUSE_MS?: number;

  @IsOptional()
  @IsUrl({ require_tld: false })
  PRICE_API_BASE_URL?: string;

  @IsOptional()
  @IsString()
  NEWS_API_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  NEWS_API_BASE_URL?: string;

  @IsOptional()
  @IsString()
  NEWS_FEED_URL?: string;

  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsOptional()
  @IsString()
  OPENAI_MODEL?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(2)
  OPENAI_TEMPERATURE?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  OPENAI_MAX_TOKENS?: number;

  @IsOptional()
  @IsString()
  LOG_DIR?: string;

  @IsOptional()
  @IsString()
  LOG_LEVELS?: string;
}

export function validateEnv(config: Record<string, unknown>) {
  // empty strings in .env files mean "unset"
  const present = Object.fromEntries(Object.entries(config).filter(([, value]) => value !== ""));
  const validated = plainToInstance(EnvironmentVariables, present);
  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(", ")}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  return validated;
}
