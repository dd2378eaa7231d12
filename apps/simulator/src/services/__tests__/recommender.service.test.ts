import { describe, expect, it } from "vitest";
import { day } from "../../../test/helpers";
import type { ChatCompletionClient, ChatReply, FunctionTool } from "../llm-client";
import { RecommenderService, buildPrompt, stripCodeFence } from "../recommender.service";

const D = day("2024-03-04");
const NEWS = [
  { title: "Apple beats estimates", description: "Quarterly revenue up" },
  { title: "Supply update", description: "No description" },
];

class FakeChatClient implements ChatCompletionClient {
  readonly prompts: string[] = [];
  readonly tools: FunctionTool[] = [];

  constructor(private readonly reply: ChatReply | Error) {}

  async complete(prompt: string, tool: FunctionTool): Promise<ChatReply> {
    this.prompts.push(prompt);
    this.tools.push(tool);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

const viaTool = (args: unknown): ChatReply => ({ functionArguments: JSON.stringify(args), content: null });

describe("RecommenderService", () => {
  it("returns the validated tool-call recommendation", async () => {
    const client = new FakeChatClient(viaTool({ symbol: "AAPL", buy_limit: 150, sell_limit: 180, action: "BUY" }));

    const result = await new RecommenderService(client).analyze("AAPL", NEWS, 145, D);

    expect(result).toEqual({
      status: "ok",
      recommendation: { symbol: "AAPL", buyLimit: 150, sellLimit: 180, action: "BUY" },
    });
    expect(client.tools[0].name).toBe("trade_recommendation");
    expect(client.tools[0].parameters).toMatchObject({ required: ["symbol", "buy_limit", "sell_limit", "action"] });
  });

  it("upper-cases the action before validating it", async () => {
    const client = new FakeChatClient(viaTool({ symbol: "AAPL", buy_limit: 150, sell_limit: 180, action: " sell " }));

    const result = await new RecommenderService(client).analyze("AAPL", NEWS, 145, D);

    expect(result.status).toBe("ok");
    expect(result.recommendation.action).toBe("SELL");
  });

  it("parses fenced JSON content when the model answers without a tool call", async () => {
    const content = '```json\n{"symbol":"AAPL","buy_limit":140,"sell_limit":170,"action":"HOLD"}\n```';
    const client = new FakeChatClient({ functionArguments: null, content });

    const result = await new RecommenderService(client).analyze("AAPL", NEWS, 145, D);

    expect(result).toEqual({
      status: "ok",
      recommendation: { symbol: "AAPL", buyLimit: 140, sellLimit: 170, action: "HOLD" },
    });
  });

  it("keeps the requested symbol when the model names another one", async () => {
    const client = new FakeChatClient(viaTool({ symbol: "MSFT", buy_limit: 150, sell_limit: 180, action: "BUY" }));

    const result = await new RecommenderService(client).analyze("AAPL", NEWS, 145, D);

    expect(result.recommendation.symbol).toBe("AAPL");
  });

  it("degrades to HOLD at plus or minus 5% without a client", async () => {
    const result = await new RecommenderService(null).analyze("AAPL", NEWS, 100, D);

    expect(result).toEqual({
      status: "degraded",
      reason: "missing-api-key",
      detail: "OPENAI_API_KEY is not configured",
      recommendation: { symbol: "AAPL", buyLimit: 95, sellLimit: 105, action: "HOLD" },
    });
  });

  it("degrades when the request fails", async () => {
    const client = new FakeChatClient(new Error("429 rate limited"));

    const result = await new RecommenderService(client).analyze("AAPL", NEWS, 200, D);

    expect(result.status).toBe("degraded");
    if (result.status === "degraded") {
      expect(result.reason).toBe("request-failed");
      expect(result.detail).toBe("Error: 429 rate limited");
    }
    expect(result.recommendation.action).toBe("HOLD");
    expect(result.recommendation.buyLimit).toBeCloseTo(190, 10);
    expect(result.recommendation.sellLimit).toBeCloseTo(210, 10);
  });

  it.each([
    ["an empty reply", { functionArguments: null, content: null }, "no-structured-output"],
    ["prose instead of JSON", { functionArguments: null, content: "I would buy." }, "no-structured-output"],
    ["a JSON array", viaTool([1, 2]), "invalid-structure"],
    ["a missing sell limit", viaTool({ symbol: "AAPL", buy_limit: 150, action: "BUY" }), "invalid-structure"],
    ["a string limit", viaTool({ symbol: "AAPL", buy_limit: "150", sell_limit: 180, action: "BUY" }), "invalid-structure"],
    ["an unknown action", viaTool({ symbol: "AAPL", buy_limit: 150, sell_limit: 180, action: "STRONG_BUY" }), "invalid-structure"],
  ])("degrades on %s", async (_label, reply, reason) => {
    const result = await new RecommenderService(new FakeChatClient(reply)).analyze("AAPL", NEWS, 100, D);

    expect(result.status).toBe("degraded");
    expect(result.status === "degraded" && result.reason).toBe(reason);
    expect(result.recommendation).toEqual({ symbol: "AAPL", buyLimit: 95, sellLimit: 105, action: "HOLD" });
  });

  it("sends the news, price and date in the prompt", async () => {
    const client = new FakeChatClient(viaTool({ symbol: "AAPL", buy_limit: 150, sell_limit: 180, action: "BUY" }));

    await new RecommenderService(client).analyze("AAPL", NEWS, 145, D);

    expect(client.prompts[0]).toBe(buildPrompt("AAPL", NEWS, 145, "2024-03-04"));
    expect(client.prompts[0]).toContain("Apple beats estimates - Quarterly revenue up\nSupply update - No description");
    expect(client.prompts[0]).toContain("Current Price: 145");
    expect(client.prompts[0]).toContain("current price for AAPL on 2024-03-04");
  });
});

describe("stripCodeFence", () => {
  it("removes json fences", () => {
    expect(stripCodeFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it("leaves bare JSON alone", () => {
    expect(stripCodeFence(' {"a":1} ')).toBe('{"a":1}');
  });
});
