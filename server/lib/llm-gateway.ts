import OpenAI from "openai";

export interface CompletionRequest {
  /** Omitted for stages that send a single user message */
  systemPrompt?: string;
  userPrompt: string;
  model: string;
  temperature: number;
  maxTokens: number;
  /** Ask the provider to constrain output to one JSON object */
  json: boolean;
}

/** Fixed per-stage call settings */
export type ModelSettings = Pick<CompletionRequest, "model" | "temperature" | "maxTokens" | "json">;

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type CompletionResult =
  | { ok: true; text: string; usage: TokenUsage }
  | { ok: false; error: string; status?: number };

/** Chat-completion boundary used by every stage processor. Never throws. */
export interface LlmGateway {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

const EMPTY_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

export class OpenAiGateway implements LlmGateway {
  constructor(private readonly client: OpenAI) {}

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: "system", content: request.systemPrompt });
    }
    messages.push({ role: "user", content: request.userPrompt });

    try {
      const response = await this.client.chat.completions.create({
        model: request.model,
        messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        ...(request.json ? { response_format: { type: "json_object" as const } } : {}),
      });

      const text = response.choices[0]?.message?.content;
      if (!text) {
        return { ok: false, error: "No response content from AI model" };
      }

      const usage = response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : EMPTY_USAGE;

      return { ok: true, text, usage };
    } catch (err) {
      if (err instanceof OpenAI.APIError) {
        console.error(`[LLM] ${request.model} request failed (${err.status ?? "no status"}):`, err.message);
        return { ok: false, error: `AI request failed: ${err.message}`, status: err.status };
      }
      const message = err instanceof Error ? err.message : "Unknown error";
      console.error(`[LLM] ${request.model} request failed:`, message);
      return { ok: false, error: `AI request failed: ${message}` };
    }
  }
}

function getConfig() {
  const apiKey = process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error("Missing OpenAI configuration. Set OPENAI_API_KEY");
  }
  return { apiKey };
}

/**
 * Build the process-wide gateway. Retries are disabled: a failed call is a
 * per-item failure and the item stays eligible for the next run.
 */
export function createOpenAiGateway(): OpenAiGateway {
  const { apiKey } = getConfig();
  return new OpenAiGateway(new OpenAI({ apiKey, maxRetries: 0 }));
}
