/**
 * Tessera SDK - Tool Response
 *
 * What a tool hands back to the toolkit. Failures are ordinary responses with
 * `metadata.error = true` and content prefixed by "Error: ".
 */

import { z } from 'zod';
import { parseContent, serializeContentBlock, type ContentBlock } from './message/content-blocks.js';

export type ToolResponseContent = string | ContentBlock[];

export interface ToolResponseDict {
  content: string | Array<Record<string, unknown>>;
  is_final: boolean;
  timestamp: string;
  metadata: Record<string, unknown>;
}

const toolResponseDictSchema = z.object({
  content: z.unknown(),
  is_final: z.boolean().default(true),
  timestamp: z.string().optional(),
  metadata: z.record(z.string(), z.unknown()).nullish(),
});

export class ToolResponse {
  content: ToolResponseContent;
  /** False for a partial chunk from a streaming tool */
  isFinal: boolean;
  metadata?: Record<string, unknown>;
  timestamp: string;

  constructor(content: ToolResponseContent, isFinal = true, metadata?: Record<string, unknown>) {
    this.content = content;
    this.isFinal = isFinal;
    this.metadata = metadata;
    this.timestamp = new Date().toISOString();
  }

  static success(content: ToolResponseContent, metadata?: Record<string, unknown>): ToolResponse {
    return new ToolResponse(content, true, metadata);
  }

  /**
   * An error-kind response. `code` is recorded as `error_code` when given.
   */
  static error(message: string, code?: string): ToolResponse {
    const metadata: Record<string, unknown> = { error: true, error_message: message };
    if (code !== undefined) {
      metadata.error_code = code;
    }
    return new ToolResponse(`Error: ${message}`, true, metadata);
  }

  static streaming(content: ToolResponseContent): ToolResponse {
    return new ToolResponse(content, false);
  }

  isError(): boolean {
    return this.metadata?.error === true;
  }

  getContentAsString(): string {
    if (typeof this.content === 'string') {
      return this.content;
    }
    return this.content
      .map(block => {
        switch (block.type) {
          case 'text':
            return block.text;
          case 'thinking':
            return block.thinking;
          default:
            return JSON.stringify(serializeContentBlock(block));
        }
      })
      .join('\n');
  }

  hasContent(): boolean {
    return this.content.length > 0;
  }

  toDict(): ToolResponseDict {
    return {
      content: typeof this.content === 'string' ? this.content : this.content.map(serializeContentBlock),
      is_final: this.isFinal,
      timestamp: this.timestamp,
      metadata: this.metadata ? { ...this.metadata } : {},
    };
  }

  static fromDict(data: unknown): ToolResponse {
    const dict = toolResponseDictSchema.parse(data);
    const response = new ToolResponse(parseContent(dict.content), dict.is_final, dict.metadata ?? undefined);
    if (dict.timestamp !== undefined) {
      response.timestamp = dict.timestamp;
    }
    return response;
  }

  toString(): string {
    return `ToolResponse{content=${this.getContentAsString()}, isFinal=${this.isFinal}, timestamp='${this.timestamp}'}`;
  }
}
