/**
 * Tessera - OpenAI-Compatible Chat Model
 *
 * Connects the agent to any endpoint speaking the Chat Completions API
 * (OpenAI, Azure, vLLM, Ollama and other local servers).
 */

import { ConfigError, errorMessage, InterruptedError, ModelError, TimeoutError } from '../sdk/errors.js';
import { OpenAIFormatter, openAIResponseSchema } from '../sdk/formatter/openai-formatter.js';
import type { Msg } from '../sdk/message/msg.js';
import { ChatModelBase } from '../sdk/model/chat-model.js';
import { ChatResponse, ChatUsage } from '../sdk/model/chat-response.js';
import type { Logger, ModelCallOptions, ToolChoice, ToolSchema } from '../sdk/types.js';
import { defaultLogger } from './logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface OpenAIChatModelConfig {
  /** Model name (e.g., 'gpt-4o') */
  model: string;

  /** API key (falls back to OPENAI_API_KEY) */
  apiKey?: string;

  /** Base URL of the API (default https://api.openai.com/v1) */
  baseUrl?: string;

  /** Maximum tokens for completion */
  maxTokens?: number;

  /** Sampling temperature */
  temperature?: number;

  /** Request timeout in milliseconds */
  timeoutMs?: number;

  formatter?: OpenAIFormatter;
  logger?: Logger;

  /** Fetch implementation (default: the global fetch) */
  fetch?: typeof fetch;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_MODEL_TIMEOUT_MS = 120_000; // 2 minutes
const DEFAULT_TEMPERATURE = 0.1;

// ============================================================================
// Chat Model Implementation
// ============================================================================

/**
 * OpenAIChatModel - Chat Completions over fetch, with tool calling.
 */
export class OpenAIChatModel extends ChatModelBase {
  readonly formatter: OpenAIFormatter;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly maxTokens?: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;

  constructor(config: OpenAIChatModelConfig) {
    super(config.model);

    const apiKey = config.apiKey ?? process.env.OPENAI_API_KEY;
    if (apiKey === undefined || apiKey === '') {
      throw new ConfigError([
        'No API key provided for the chat model. Set OPENAI_API_KEY or pass apiKey in config.',
      ]);
    }

    this.apiKey = apiKey;
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS;
    this.formatter = config.formatter ?? new OpenAIFormatter();
    this.logger = config.logger ?? defaultLogger();
    this.fetchFn = config.fetch ?? fetch;

    this.logger.info('Chat model initialized', {
      model: this.modelName,
      baseUrl: this.baseUrl,
      maxTokens: this.maxTokens,
    });
  }

  protected async doCall(
    messages: Msg[],
    tools: ToolSchema[],
    toolChoice: ToolChoice | undefined,
    options: ModelCallOptions
  ): Promise<ChatResponse> {
    const url = `${this.baseUrl}/chat/completions`;
    const payload = this.formatter.format(messages, {
      tools,
      toolChoice,
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    });

    this.logger.debug('Sending chat completion request', {
      model: this.modelName,
      messageCount: payload.messages.length,
      toolCount: tools.length,
    });

    const started = performance.now();
    const response = await this.fetchWithTimeout(
      url,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({ model: this.modelName, ...payload }),
      },
      options.signal
    );

    if (!response.ok) {
      const error = await response.text();
      throw new ModelError(`Chat completion API error (${response.status}): ${error}`, {
        status: response.status,
      });
    }

    const data: unknown = await response.json();
    const message = this.formatter.parseResponse(data);
    const elapsedSeconds = (performance.now() - started) / 1000;

    const meta = openAIResponseSchema.safeParse(data);
    const usage = meta.success && meta.data.usage
      ? new ChatUsage(meta.data.usage.prompt_tokens, meta.data.usage.completion_tokens, elapsedSeconds)
      : new ChatUsage(0, 0, elapsedSeconds);
    const finishReason = meta.success ? meta.data.choices[0].finish_reason ?? undefined : undefined;

    return new ChatResponse(message.getContentBlocks(), {
      id: meta.success ? meta.data.id : undefined,
      usage,
      metadata: finishReason === undefined ? undefined : { finishReason },
    });
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  /**
   * Fetch with timeout support. `signal` cancels the request early.
   */
  private async fetchWithTimeout(url: string, init: RequestInit, signal?: AbortSignal): Promise<Response> {
    if (signal?.aborted) {
      throw new InterruptedError();
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await this.fetchFn(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new InterruptedError();
      }
      if (controller.signal.aborted) {
        throw new TimeoutError('Chat completion request', this.timeoutMs);
      }
      throw new ModelError(`Chat completion request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create an OpenAI-compatible chat model.
 */
export function createChatModel(config: OpenAIChatModelConfig): OpenAIChatModel {
  return new OpenAIChatModel(config);
}
