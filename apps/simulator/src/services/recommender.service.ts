import { Inject, Injectable, Logger } from "@nestjs/common";
import { plainToInstance } from "class-transformer";
import { validateSync } from "class-validator";
import { RecommendationDto } from "../dto/recommendation.dto";
import { CHAT_COMPLETION_CLIENT } from "./llm-client";
import type { ChatCompletionClient, FunctionTool } from "./llm-client";
import type { DegradedReason, NewsItem, Recommendation, RecommendationResult, Recommender } from "../types";
import { TRADE_ACTIONS } from "../types";
import { formatDay } from "../utils/dates";

export const TRADE_RECOMMENDATION_TOOL: FunctionTool = {
  name: "trade_recommendation",
  description:
    "Return a trading recommendation with the following keys: symbol, buy_limit, sell_limit, and action.",
  parameters: {
    type: "object",
    properties: {
      symbol: { type: "string", description: "The stock symbol." },
      buy_limit: { type: "number", description: "The price below which the stock should be bought." },
      sell_limit: { type: "number", description: "The price above which the stock should be sold." },
      action: { type: "string", enum: [...TRADE_ACTIONS], description: "The recommended action." },
    },
    required: ["symbol", "buy_limit", "sell_limit", "action"],
  },
};

export const fallbackRecommendation = (symbol: string, currentPrice: number): Recommendation => ({
  symbol,
  buyLimit: currentPrice * 0.95,
  sellLimit: currentPrice * 1.05,
  action: "HOLD",
});

class RecommendationRejected extends Error {
  constructor(
    readonly reason: DegradedReason,
    message: string,
  ) {
    super(message);
  }
}

@Injectable()
export class RecommenderService implements Recommender {
  private readonly logger = new Logger(RecommenderService.name);

  constructor(@Inject(CHAT_COMPLETION_CLIENT) private readonly client: ChatCompletionClient | null) {}

  async analyze(symbol: string, news: NewsItem[], currentPrice: number, date: Date): Promise<RecommendationResult> {
    const day = formatDay(date);
    if (!this.client) {
      return this.degrade(symbol, currentPrice, day, "missing-api-key", "OPENAI_API_KEY is not configured");
    }

    let raw: string;
    try {
      const reply = await this.client.complete(buildPrompt(symbol, news, currentPrice, day), TRADE_RECOMMENDATION_TOOL);
      raw = reply.functionArguments ?? stripCodeFence(reply.content ?? "");
    } catch (error) {
      return this.degrade(symbol, currentPrice, day, "request-failed", String(error));
    }
    if (raw.trim().length === 0) {
      return this.degrade(symbol, currentPrice, day, "no-structured-output", "model returned neither a tool call nor content");
    }

    try {
      const recommendation = this.parseRecommendation(symbol, raw, day);
      this.logger.log(
        `[${day}] LLM recommendation for ${symbol}: ${recommendation.action} buy<=${recommendation.buyLimit.toFixed(2)} sell>=${recommendation.sellLimit.toFixed(2)}`,
      );
      return { status: "ok", recommendation };
    } catch (error) {
      const reason = error instanceof RecommendationRejected ? error.reason : "invalid-structure";
      return this.degrade(symbol, currentPrice, day, reason, error instanceof Error ? error.message : String(error));
    }
  }

  private parseRecommendation(symbol: string, raw: string, day: string): Recommendation {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new RecommendationRejected("no-structured-output", `output is not JSON: ${String(error)}`);
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new RecommendationRejected("invalid-structure", "output is not a JSON object");
    }

    const dto = plainToInstance(RecommendationDto, parsed);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const details = errors.map((error) => Object.values(error.constraints ?? {}).join(", ")).join("; ");
      throw new RecommendationRejected("invalid-structure", details);
    }

    if (dto.symbol && dto.symbol.toUpperCase() !== symbol.toUpperCase()) {
      this.logger.warn(`[${day}] LLM answered for ${dto.symbol} while asked about ${symbol}; keeping ${symbol}`);
    }
    return { symbol, buyLimit: dto.buy_limit, sellLimit: dto.sell_limit, action: dto.action };
  }

  private degrade(
    symbol: string,
    currentPrice: number,
    day: string,
    reason: DegradedReason,
    detail: string,
  ): RecommendationResult {
    this.logger.error(`[${day}] LLM analysis failed for ${symbol} (${reason}): ${detail}`);
    return { status: "degraded", recommendation: fallbackRecommendation(symbol, currentPrice), reason, detail };
  }
}

export function buildPrompt(symbol: string, news: NewsItem[], currentPrice: number, day: string) {
  const newsSummary = news.map((item) => `${item.title} - ${item.description}`).join("\n");
  return [
    `You are an expert stock analyst. Given the following news and the current price for ${symbol} on ${day}:`,
    "News:",
    newsSummary,
    `Current Price: ${currentPrice}`,
    "Based on this information, provide a trading recommendation optimized for profit.",
  ].join("\n\n");
}

export const stripCodeFence = (text: string) =>
  text
    .replace(/^```json/gm, "")
    .replace(/^```/gm, "")
    .trim();
