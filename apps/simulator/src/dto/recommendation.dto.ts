import { Transform } from "class-transformer";
import { IsIn, IsNumber, IsOptional, IsString } from "class-validator";
import { TRADE_ACTIONS } from "../types";
import type { TradeAction } from "../types";

/** Arguments of the `trade_recommendation` tool call, as the model returns them. */
export class RecommendationDto {
  @IsOptional()
  @IsString()
  symbol?: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  buy_limit!: number;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  sell_limit!: number;

  @Transform(({ value }) => (typeof value === "string" ? value.trim().toUpperCase() : value))
  @IsIn(TRADE_ACTIONS)
  action!: TradeAction;
}
