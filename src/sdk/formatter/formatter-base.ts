/**
 * Tessera SDK - Formatter Base
 *
 * A formatter translates the SDK's messages into one provider's request
 * payload and the provider's reply back into a Msg. It is owned by the model
 * that speaks that provider's protocol, not by the agent.
 */

import { ValidationError } from '../errors.js';
import { MEDIA_BLOCK_TYPES } from '../message/content-blocks.js';
import type { Msg } from '../message/msg.js';
import type { ToolChoice, ToolSchema } from '../types.js';
import { estimateTokenCount } from '../utils/tokens.js';

export interface FormatOptions {
  tools?: ToolSchema[];
  toolChoice?: ToolChoice;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
}

export interface FormatterCapabilities {
  supportsStreaming: boolean;
  supportsToolCalls: boolean;
  supportsMultimodal: boolean;
  /** Context budget in estimated tokens; -1 means unlimited */
  maxTokens: number;
}

/**
 * Drop the oldest non-system messages until the estimate fits `maxTokens` or
 * only system messages remain. A non-positive budget disables truncation.
 */
export function truncateMessages(messages: readonly Msg[], maxTokens: number): Msg[] {
  const truncated = [...messages];
  if (maxTokens <= 0) {
    return truncated;
  }

  while (estimateTokenCount(truncated) > maxTokens && truncated.length > 1) {
    const index = truncated.findIndex(msg => msg.role !== 'system');
    if (index === -1) {
      break;
    }
    truncated.splice(index, 1);
  }
  return truncated;
}

export abstract class FormatterBase<TPayload> implements FormatterCapabilities {
  readonly supportsStreaming: boolean = false;
  readonly supportsToolCalls: boolean = false;
  readonly supportsMultimodal: boolean = false;
  readonly maxTokens: number = -1;

  /**
   * Validate, truncate to the context budget, then build the provider payload.
   *
   * @throws ValidationError when a message carries content this formatter cannot express
   */
  format(messages: Msg[], options: FormatOptions = {}): TPayload {
    this.validateMessages(messages);
    return this.buildPayload(truncateMessages(messages, this.maxTokens), options);
  }

  abstract parseResponse(payload: unknown): Msg;

  protected abstract buildPayload(messages: Msg[], options: FormatOptions): TPayload;

  validateMessages(messages: readonly Msg[]): void {
    if (messages.length === 0) {
      throw new ValidationError('Messages cannot be empty');
    }
    for (const msg of messages) {
      this.validateMessage(msg);
    }
  }

  protected validateMessage(msg: Msg): void {
    if (!this.supportsMultimodal && MEDIA_BLOCK_TYPES.some(type => msg.hasContentBlocks(type))) {
      throw new ValidationError(`${this.constructor.name} does not support multimodal content`);
    }
    if (!this.supportsToolCalls && (msg.hasContentBlocks('tool_use') || msg.hasContentBlocks('tool_result'))) {
      throw new ValidationError(`${this.constructor.name} does not support tool calls`);
    }
  }

  toString(): string {
    return (
      `${this.constructor.name}{maxTokens=${this.maxTokens}, supportsStreaming=${this.supportsStreaming}, ` +
      `supportsToolCalls=${this.supportsToolCalls}, supportsMultimodal=${this.supportsMultimodal}}`
    );
  }
}
