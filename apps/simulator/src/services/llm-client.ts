import OpenAI from "openai";
import type { SimulationConfig } from "../config/simulation.config";

export const CHAT_COMPLETION_CLIENT = Symbol("CHAT_COMPLETION_CLIENT");

export interface FunctionTool {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ChatReply {
  /** Raw JSON arguments of the first call to the requested function, if the model made one. */
  functionArguments: string | null;
  content: string | null;
}

export interface ChatCompletionClient {
  complete(prompt: string, tool: FunctionTool): Promise<ChatReply>;
}

export class OpenAiChatClient implements ChatCompletionClient {
  private readonly openai: OpenAI;

  constructor(private readonly config: SimulationConfig & { openaiApiKey: string }) {
    this.openai = new OpenAI({ apiKey: config.openaiApiKey });
  }

  async complete(prompt: string, tool: FunctionTool): Promise<ChatReply> {
    const completion = await this.openai.chat.completions.create({
      model: this.config.openaiModel,
      messages: [{ role: "user", content: prompt }],
      tools: [{ type: "function", function: tool }],
      tool_choice: "auto",
      temperature: this.config.openaiTemperature,
      max_tokens: this.config.openaiMaxTokens,
    });

    const message = completion.choices[0]?.message;
    const call = message?.tool_calls?.find(
      (toolCall) => toolCall.type === "function" && toolCall.function.name === tool.name,
    );
    return {
      functionArguments: call?.type === "function" ? call.function.arguments : null,
      content: message?.content ?? null,
    };
  }
}

/** Null when no key is configured; the recommender then degrades without calling out. */
export const chatCompletionClientFactory = (config: SimulationConfig): ChatCompletionClient | null => {
  const apiKey = config.openaiApiKey;
  return apiKey ? new OpenAiChatClient({ ...config, openaiApiKey: apiKey }) : null;
};
