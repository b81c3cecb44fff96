/**
 * Tessera SDK - Content Blocks
 *
 * A message's content is either plain text or an ordered list of blocks. Each
 * block is a plain object discriminated by `type`, so blocks serialize as-is.
 */

import { z } from 'zod';
import { isRecord } from '../utils/guards.js';

// ============================================================================
// Media Sources
// ============================================================================

export interface Base64Source {
  type: 'base64';
  /** MIME type, e.g. "image/png" */
  media_type: string;
  data: string;
}

export interface UrlSource {
  type: 'url';
  url: string;
}

export type MediaSource = Base64Source | UrlSource;

// ============================================================================
// Blocks
// ============================================================================

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ThinkingBlock {
  type: 'thinking';
  thinking: string;
}

export interface ImageBlock {
  type: 'image';
  source: MediaSource;
}

export interface AudioBlock {
  type: 'audio';
  source: MediaSource;
}

export interface VideoBlock {
  type: 'video';
  source: MediaSource;
}

export interface ToolUseBlock {
  type: 'tool_use';
  /** Call id, echoed back by the matching tool_result */
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  /** The tool_use id this result answers */
  id: string;
  /** Tool name, kept for display and for formatters that need it */
  name?: string;
  output: string | ContentBlock[];
}

/**
 * A block whose tag is not one of the known kinds. The original object is
 * kept verbatim so it survives a parse/serialize round trip.
 */
export interface OpaqueBlock {
  type: 'opaque';
  raw: Record<string, unknown>;
}

export type ContentBlock =
  | TextBlock
  | ThinkingBlock
  | ImageBlock
  | AudioBlock
  | VideoBlock
  | ToolUseBlock
  | ToolResultBlock
  | OpaqueBlock;

export type ContentBlockType = ContentBlock['type'];

export type BlockOfType<T extends ContentBlockType> = Extract<ContentBlock, { type: T }>;

export const MEDIA_BLOCK_TYPES = ['image', 'audio', 'video'] as const;

// ============================================================================
// Constructors
// ============================================================================

export function textBlock(text: string): TextBlock {
  return { type: 'text', text };
}

export function thinkingBlock(thinking: string): ThinkingBlock {
  return { type: 'thinking', thinking };
}

export function toolUseBlock(id: string, name: string, input: Record<string, unknown> = {}): ToolUseBlock {
  return { type: 'tool_use', id, name, input };
}

export function toolResultBlock(id: string, output: string | ContentBlock[], name?: string): ToolResultBlock {
  return name === undefined ? { type: 'tool_result', id, output } : { type: 'tool_result', id, name, output };
}

export function isBlockOfType<T extends ContentBlockType>(block: ContentBlock, type: T): block is BlockOfType<T> {
  return block.type === type;
}

// ============================================================================
// Parsing
// ============================================================================

const mediaSourceSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('base64'), media_type: z.string(), data: z.string() }),
  z.object({ type: z.literal('url'), url: z.string() }),
]);

const knownBlockSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('thinking'), thinking: z.string() }),
  z.object({ type: z.literal('image'), source: mediaSourceSchema }),
  z.object({ type: z.literal('audio'), source: mediaSourceSchema }),
  z.object({ type: z.literal('video'), source: mediaSourceSchema }),
  z.object({
    type: z.literal('tool_use'),
    id: z.string(),
    name: z.string(),
    input: z.record(z.string(), z.unknown()).default({}),
  }),
  z.object({
    type: z.literal('tool_result'),
    id: z.string(),
    name: z.string().optional(),
    output: z.union([z.string(), z.array(z.unknown())]),
  }),
]);

const KNOWN_TYPES = new Set(['text', 'thinking', 'image', 'audio', 'video', 'tool_use', 'tool_result']);

/**
 * Parse one serialized block.
 *
 * Known tags are validated against their shape and throw on mismatch; any other
 * tagged object becomes an OpaqueBlock.
 */
export function parseContentBlock(value: unknown): ContentBlock {
  if (!isRecord(value) || typeof value.type !== 'string') {
    throw new TypeError('Content block must be an object with a string "type"');
  }

  if (value.type === 'opaque' && isRecord(value.raw)) {
    return { type: 'opaque', raw: { ...value.raw } };
  }

  if (!KNOWN_TYPES.has(value.type)) {
    return { type: 'opaque', raw: { ...value } };
  }

  const parsed = knownBlockSchema.parse(value);
  if (parsed.type === 'tool_result') {
    const output = typeof parsed.output === 'string' ? parsed.output : parsed.output.map(parseContentBlock);
    return toolResultBlock(parsed.id, output, parsed.name);
  }
  return parsed;
}

export function parseContent(value: unknown): string | ContentBlock[] {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(parseContentBlock);
  }
  if (value === null || value === undefined) {
    return '';
  }
  throw new TypeError('Message content must be a string or an array of content blocks');
}

/**
 * Serialize a block to its dict form. Opaque blocks emit their original object.
 */
export function serializeContentBlock(block: ContentBlock): Record<string, unknown> {
  switch (block.type) {
    case 'opaque':
      return structuredClone(block.raw);
    case 'tool_result':
      return {
        ...block,
        output: typeof block.output === 'string' ? block.output : block.output.map(serializeContentBlock),
      };
    default:
      return structuredClone({ ...block });
  }
}

/**
 * Concatenate the text blocks of a block list; null when there is no text.
 */
export function gatherText(blocks: readonly ContentBlock[]): string | null {
  const text = blocks
    .filter((block): block is TextBlock => block.type === 'text')
    .map(block => block.text)
    .join('');
  return text.length > 0 ? text : null;
}
