/**
 * Tessera SDK - OpenAI Formatter
 *
 * Chat Completions wire format. Tool results are expanded into one `tool`
 * message per result, since the API correlates them by `tool_call_id`.
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import {
  textBlock,
  toolUseBlock,
  type ContentBlock,
  type MediaSource,
  type ToolResultBlock,
} from '../message/content-blocks.js';
import { Msg } from '../message/msg.js';
import type { ToolChoice, ToolSchema } from '../types.js';
import { isRecord } from '../utils/guards.js';
import { FormatterBase, type FormatOptions } from './formatter-base.js';

// ============================================================================
// Wire Types
// ============================================================================

export type OpenAIContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface OpenAIToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

export type OpenAIMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string | OpenAIContentPart[]; name?: string }
  | { role: 'assistant'; content: string | null; name?: string; tool_calls?: OpenAIToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

export type OpenAIToolChoice =
  | 'auto'
  | 'none'
  | 'required'
  | { type: 'function'; function: { name: string } };

export interface OpenAIRequestBody {
  messages: OpenAIMessage[];
  tools?: ToolSchema[];
  tool_choice?: OpenAIToolChoice;
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
}

const responseMessageSchema = z.object({
  role: z.string().nullish(),
  content: z.string().nullish(),
  tool_calls: z
    .array(
      z.object({
        id: z.string(),
        type: z.string().optional(),
        function: z.object({ name: z.string(), arguments: z.string().default('{}') }),
      })
    )
    .nullish(),
});

export const openAIResponseSchema = z.object({
  id: z.string().optional(),
  choices: z
    .array(z.object({ message: responseMessageSchema, finish_reason: z.string().nullish() }))
    .min(1, 'No choices in OpenAI response'),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      completion_tokens: z.number().default(0),
      total_tokens: z.number().optional(),
    })
    .nullish(),
});

export type OpenAIResponse = z.infer<typeof openAIResponseSchema>;

const UNSUPPORTED_MEDIA = ['audio', 'video'] as const;

// ============================================================================
// Formatter
// ============================================================================

export interface OpenAIFormatterOptions {
  /** Context budget in estimated tokens; -1 disables truncation */
  maxTokens?: number;
}

export class OpenAIFormatter extends FormatterBase<OpenAIRequestBody> {
  override readonly supportsStreaming = true;
  override readonly supportsToolCalls = true;
  override readonly supportsMultimodal = true;
  override readonly maxTokens: number;

  constructor(options: OpenAIFormatterOptions = {}) {
    super();
    this.maxTokens = options.maxTokens ?? -1;
  }

  /**
   * Images are the only media the API takes; audio and video are rejected.
   */
  protected override validateMessage(msg: Msg): void {
    super.validateMessage(msg);
    const unsupported = UNSUPPORTED_MEDIA.find(type => msg.hasContentBlocks(type));
    if (unsupported) {
      throw new ValidationError(`OpenAIFormatter does not support ${unsupported} content`);
    }
  }

  /**
   * Parse a Chat Completions response body into an assistant message.
   *
   * Tool call arguments are decoded from their JSON string; arguments that do
   * not decode to an object are passed through under `raw_arguments`.
   */
  parseResponse(payload: unknown): Msg {
    const parsed = openAIResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationError(`Failed to parse OpenAI response: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }

    const { message } = parsed.data.choices[0];
    const blocks: ContentBlock[] = [];
    if (message.content) {
      blocks.push(textBlock(message.content));
    }
    for (const call of message.tool_calls ?? []) {
      blocks.push(toolUseBlock(call.id, call.function.name, decodeArguments(call.function.arguments)));
    }

    return new Msg('assistant', blocks, 'assistant');
  }

  protected buildPayload(messages: Msg[], options: FormatOptions): OpenAIRequestBody {
    const body: OpenAIRequestBody = {
      messages: messages.flatMap(msg => this.convertMessage(msg)),
    };

    if (options.tools && options.tools.length > 0) {
      body.tools = options.tools;
      if (options.toolChoice !== undefined) {
        body.tool_choice = mapToolChoice(options.toolChoice);
      }
    }
    if (options.temperature !== undefined) {
      body.temperature = options.temperature;
    }
    if (options.maxTokens !== undefined) {
      body.max_tokens = options.maxTokens;
    }
    if (options.topP !== undefined) {
      body.top_p = options.topP;
    }
    return body;
  }

  private convertMessage(msg: Msg): OpenAIMessage[] {
    const results = msg.getContentBlocks('tool_result');
    if (results.length > 0) {
      return results.map((result): OpenAIMessage => ({
        role: 'tool',
        tool_call_id: result.id,
        content: stringifyToolOutput(result),
      }));
    }

    const name = msg.name.length > 0 ? msg.name : undefined;

    switch (msg.role) {
      case 'system':
        return [{ role: 'system', content: msg.getTextContent() ?? '' }];

      case 'user': {
        if (typeof msg.content === 'string') {
          return [{ role: 'user', content: msg.content, name }];
        }
        const parts = msg.content.flatMap(convertContentPart);
        return [{ role: 'user', content: parts.length > 0 ? parts : (msg.getTextContent() ?? ''), name }];
      }

      case 'assistant': {
        const toolCalls = msg.getContentBlocks('tool_use').map(
          (block): OpenAIToolCall => ({
            id: block.id,
            type: 'function',
            function: { name: block.name, arguments: JSON.stringify(block.input) },
          })
        );
        const text = typeof msg.content === 'string' ? msg.content : assistantText(msg.content);
        return [
          toolCalls.length > 0
            ? { role: 'assistant', content: text.length > 0 ? text : null, name, tool_calls: toolCalls }
            : { role: 'assistant', content: text, name },
        ];
      }
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function mediaUrl(source: MediaSource): string {
  return source.type === 'url' ? source.url : `data:${source.media_type};base64,${source.data}`;
}

/**
 * Map one block to user content parts. Tool blocks have no part and are skipped.
 */
function convertContentPart(block: ContentBlock): OpenAIContentPart[] {
  switch (block.type) {
    case 'text':
      return [{ type: 'text', text: block.text }];
    case 'thinking':
      return [{ type: 'text', text: `(thinking) ${block.thinking}` }];
    case 'image':
      return [{ type: 'image_url', image_url: { url: mediaUrl(block.source) } }];
    default:
      return [];
  }
}

function assistantText(blocks: readonly ContentBlock[]): string {
  return blocks
    .flatMap(block => (block.type === 'text' ? [block.text] : []))
    .join('');
}

function stringifyToolOutput(result: ToolResultBlock): string {
  if (typeof result.output === 'string') {
    return result.output;
  }
  return result.output
    .map(block => {
      switch (block.type) {
        case 'text':
          return block.text;
        case 'image':
          return `[image: ${mediaUrl(block.source)}]`;
        default:
          return JSON.stringify(block);
      }
    })
    .join('\n');
}

function mapToolChoice(choice: ToolChoice): OpenAIToolChoice {
  switch (choice) {
    case 'auto':
      return 'auto';
    case 'none':
      return 'none';
    case 'required':
    case 'any':
      return 'required';
    default:
      return { type: 'function', function: { name: choice } };
  }
}

function decodeArguments(raw: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return { raw_arguments: raw };
  }
  return isRecord(value) ? value : { raw_arguments: raw };
}
