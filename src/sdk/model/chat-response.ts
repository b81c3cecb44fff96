/**
 * Tessera SDK - Chat Response & Usage
 *
 * The normalized result of one model call, independent of any provider's wire format.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  parseContentBlock,
  serializeContentBlock,
  type ContentBlock,
  type ToolUseBlock,
} from '../message/content-blocks.js';

// ============================================================================
// Usage
// ============================================================================

export interface ChatUsageDict {
  input_tokens: number;
  output_tokens: number;
  time: number;
  type: 'chat';
}

const chatUsageDictSchema = z.object({
  input_tokens: z.number().int().nonnegative().default(0),
  output_tokens: z.number().int().nonnegative().default(0),
  time: z.number().nonnegative().default(0),
});

export class ChatUsage {
  readonly type = 'chat';

  constructor(
    readonly inputTokens = 0,
    readonly outputTokens = 0,
    /** Wall time of the call in seconds */
    readonly time = 0
  ) {}

  get totalTokens(): number {
    return this.inputTokens + this.outputTokens;
  }

  /**
   * Sum two usages into a new one; `undefined` is treated as zero.
   */
  add(other?: ChatUsage): ChatUsage {
    if (!other) {
      return new ChatUsage(this.inputTokens, this.outputTokens, this.time);
    }
    return new ChatUsage(
      this.inputTokens + other.inputTokens,
      this.outputTokens + other.outputTokens,
      this.time + other.time
    );
  }

  toDict(): ChatUsageDict {
    return {
      input_tokens: this.inputTokens,
      output_tokens: this.outputTokens,
      time: this.time,
      type: this.type,
    };
  }

  static fromDict(data: unknown): ChatUsage {
    const dict = chatUsageDictSchema.parse(data);
    return new ChatUsage(dict.input_tokens, dict.output_tokens, dict.time);
  }
}

// ============================================================================
// Response
// ============================================================================

export interface ChatResponseOptions {
  id?: string;
  createdAt?: string;
  usage?: ChatUsage;
  metadata?: Record<string, unknown>;
}

export interface ChatResponseDict {
  content: Array<Record<string, unknown>>;
  id: string;
  created_at: string;
  type: 'chat';
  usage: ChatUsageDict | null;
  metadata: Record<string, unknown> | null;
}

const chatResponseDictSchema = z.object({
  content: z.array(z.unknown()).default([]),
  id: z.string().optional(),
  created_at: z.string().optional(),
  usage: z.unknown().optional(),
  metadata: z.record(z.string(), z.unknown()).nullish(),
});

export class ChatResponse {
  readonly type = 'chat';
  readonly content: ContentBlock[];
  readonly id: string;
  readonly createdAt: string;
  readonly usage?: ChatUsage;
  readonly metadata?: Record<string, unknown>;

  constructor(content: ContentBlock[], options: ChatResponseOptions = {}) {
    this.content = content;
    this.id = options.id ?? randomUUID();
    this.createdAt = options.createdAt ?? new Date().toISOString();
    this.usage = options.usage;
    this.metadata = options.metadata;
  }

  getToolUseBlocks(): ToolUseBlock[] {
    return this.content.filter((block): block is ToolUseBlock => block.type === 'tool_use');
  }

  toDict(): ChatResponseDict {
    return {
      content: this.content.map(serializeContentBlock),
      id: this.id,
      created_at: this.createdAt,
      type: this.type,
      usage: this.usage ? this.usage.toDict() : null,
      metadata: this.metadata ? { ...this.metadata } : null,
    };
  }

  static fromDict(data: unknown): ChatResponse {
    const dict = chatResponseDictSchema.parse(data);
    return new ChatResponse(dict.content.map(parseContentBlock), {
      id: dict.id,
      createdAt: dict.created_at,
      usage: dict.usage === undefined || dict.usage === null ? undefined : ChatUsage.fromDict(dict.usage),
      metadata: dict.metadata ?? undefined,
    });
  }
}
