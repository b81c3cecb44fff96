/**
 * Tessera SDK - Message
 *
 * The unit of conversation exchange. A Msg is treated as immutable once it has
 * been handed to memory; the mutators exist for callers assembling messages.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import {
  gatherText,
  parseContent,
  serializeContentBlock,
  type BlockOfType,
  type ContentBlock,
  type ContentBlockType,
} from './content-blocks.js';

export const ROLES = ['user', 'assistant', 'system'] as const;

export type Role = (typeof ROLES)[number];

export type MsgContent = string | ContentBlock[];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some(role => role === value);
}

function assertRole(value: unknown): Role {
  if (!isRole(value)) {
    throw new ValidationError(`Role must be one of: ${ROLES.join(', ')} (got "${String(value)}")`);
  }
  return value;
}

export interface MsgOptions {
  /** Reuse an id, e.g. for streaming chunks of one logical message */
  id?: string;
  metadata?: Record<string, unknown>;
  /** ISO-8601 creation time; defaults to now */
  timestamp?: string;
  /** Id of the model invocation that produced this message */
  invocationId?: string;
}

/**
 * MsgDict - The flat serialized form of a message.
 */
export interface MsgDict {
  id: string;
  name: string;
  role: Role;
  content: string | Array<Record<string, unknown>>;
  metadata: Record<string, unknown> | null;
  timestamp: string;
  invocationId?: string;
}

const msgDictSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  role: z.string(),
  content: z.unknown(),
  metadata: z.record(z.string(), z.unknown()).nullish(),
  timestamp: z.string().nullish(),
  invocationId: z.string().nullish(),
});

export class Msg {
  readonly id: string;
  name: string;
  content: MsgContent;
  metadata?: Record<string, unknown>;
  timestamp: string;
  invocationId?: string;

  private _role: Role;

  constructor(name: string, content: MsgContent, role: Role, options: MsgOptions = {}) {
    this.id = options.id ?? randomUUID();
    this.name = name;
    this.content = content;
    this._role = assertRole(role);
    this.metadata = options.metadata;
    this.timestamp = options.timestamp ?? new Date().toISOString();
    this.invocationId = options.invocationId;
  }

  get role(): Role {
    return this._role;
  }

  /** Accepts any string so untyped input is checked here rather than trusted. */
  set role(value: string) {
    this._role = assertRole(value);
  }

  /**
   * The concatenated text of the message, or null if it carries no text.
   */
  getTextContent(): string | null {
    if (typeof this.content === 'string') {
      return this.content;
    }
    return gatherText(this.content);
  }

  getContentBlocks(): ContentBlock[];
  getContentBlocks<T extends ContentBlockType>(type: T): Array<BlockOfType<T>>;
  getContentBlocks(type?: ContentBlockType): ContentBlock[] {
    if (typeof this.content === 'string') {
      return [];
    }
    return type === undefined ? [...this.content] : this.content.filter(block => block.type === type);
  }

  hasContentBlocks(type?: ContentBlockType): boolean {
    return type === undefined ? this.getContentBlocks().length > 0 : this.getContentBlocks(type).length > 0;
  }

  equals(other: Msg): boolean {
    return this.id === other.id;
  }

  toDict(): MsgDict {
    const dict: MsgDict = {
      id: this.id,
      name: this.name,
      role: this._role,
      content: typeof this.content === 'string' ? this.content : this.content.map(serializeContentBlock),
      metadata: this.metadata ? structuredClone(this.metadata) : null,
      timestamp: this.timestamp,
    };
    if (this.invocationId !== undefined) {
      dict.invocationId = this.invocationId;
    }
    return dict;
  }

  /**
   * Rebuild a message from its dict form. The id is kept when present; a fresh
   * one is generated otherwise.
   */
  static fromDict(data: unknown): Msg {
    const parsed = msgDictSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError(`Invalid message dict: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    const dict = parsed.data;
    return new Msg(dict.name, parseContent(dict.content), assertRole(dict.role), {
      id: dict.id,
      metadata: dict.metadata ?? undefined,
      timestamp: dict.timestamp ?? undefined,
      invocationId: dict.invocationId ?? undefined,
    });
  }

  toString(): string {
    return `Msg{id='${this.id}', name='${this.name}', role='${this._role}', timestamp='${this.timestamp}'}`;
  }
}
