import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions.js";
import { AuthError, TransportError, errorMessage } from "../agent/errors.js";
import type { Message } from "../agent/types.js";
import { DEFAULT_MODEL } from "../config.js";
import { log } from "../logger.js";

// ── Model Client ─────────────────────────────────────────

/** Ordered messages in, one completion out. */
export interface ModelClient {
  readonly model: string;
  complete(messages: readonly Message[]): Promise<string>;
}

export interface OpenRouterOptions {
  apiKey: string | undefined;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  baseURL?: string;
  timeoutMs?: number;
}

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

function toChatMessage(message: Message): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

/** Maps SDK failures onto the agent's fatal error types. */
export function toClientError(error: unknown): AuthError | TransportError {
  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return new AuthError(`OpenRouter rejected the API key (${error.status})`, { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new TransportError(`Could not reach OpenRouter: ${error.message}`, undefined, {
      cause: error,
    });
  }
  if (error instanceof OpenAI.APIError) {
    return new TransportError(`OpenRouter API error: ${error.message}`, error.status, {
      cause: error,
    });
  }
  return new TransportError(`OpenRouter request failed: ${errorMessage(error)}`, undefined, {
    cause: error,
  });
}

/**
 * OpenRouter speaks the OpenAI chat-completions API.
 * Failures are not retried; they end the session.
 */
export class OpenRouterClient implements ModelClient {
  readonly model: string;
  private readonly llm: OpenAI;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: OpenRouterOptions) {
    if (!options.apiKey) {
      throw new AuthError(
        "OpenRouter API key not found. Set the OPENROUTER_API_KEY environment variable.",
      );
    }
    this.model = options.model ?? DEFAULT_MODEL;
    this.temperature = options.temperature ?? 0.7;
    this.maxTokens = options.maxTokens ?? 2000;
    this.llm = new OpenAI({
      baseURL: options.baseURL ?? OPENROUTER_BASE_URL,
      apiKey: options.apiKey,
      maxRetries: 0,
      timeout: options.timeoutMs ?? 60_000,
      defaultHeaders: {
        "HTTP-Referer": "http://localhost:3000",
        "X-Title": "ReAct Utility Agent",
      },
    });
  }

  async complete(messages: readonly Message[]): Promise<string> {
    const startedAt = Date.now();
    let response: ChatCompletion;
    try {
      response = await this.llm.chat.completions.create({
        model: this.model,
        messages: messages.map(toChatMessage),
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      });
    } catch (err) {
      throw toClientError(err);
    }

    log.debug(
      {
        model: this.model,
        latencyMs: Date.now() - startedAt,
        inputTokens: response.usage?.prompt_tokens,
        outputTokens: response.usage?.completion_tokens,
      },
      "Model completion",
    );

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new TransportError("Unexpected API response format: empty completion");
    }
    return content;
  }
}
