/**
 * Tessera SDK - Memory Base
 *
 * Contract for the conversational memory an agent reasons over. Every read
 * returns a snapshot array; callers never see a live view of the store.
 */

import { z } from 'zod';
import { Msg, type MsgDict, type Role } from '../message/msg.js';
import { estimateTokenCount } from '../utils/tokens.js';

/**
 * MessageFilter - Conjunctive filter; an absent field matches everything.
 */
export interface MessageFilter {
  role?: Role;
  /** Sender name */
  name?: string;
  /** Case-sensitive substring of the text content */
  containsText?: string;
  /** Inclusive lower bound (ISO-8601) */
  after?: string;
  /** Exclusive upper bound (ISO-8601) */
  before?: string;
}

export interface MemoryStats {
  totalMessages: number;
  estimatedTokens: number;
  roleCounts: Record<Role, number>;
  isEmpty: boolean;
  memoryType: string;
}

export interface MemorySnapshot {
  readonly messages: readonly Msg[];
  readonly metadata: MemoryStats;
  readonly timestamp: string;
}

export interface MemoryExport {
  messages: MsgDict[];
  metadata: MemoryStats;
  exportedAt: string;
}

const memoryImportSchema = z.object({
  messages: z.array(z.unknown()),
});

export abstract class MemoryBase {
  /**
   * Append a message at the tail.
   *
   * @returns false when the message was rejected because the store is full
   */
  abstract addMessage(message: Msg): Promise<boolean>;

  abstract getMessages(filter?: MessageFilter): Promise<Msg[]>;

  /**
   * The last `count` messages; empty for `count <= 0`, everything for `count >= size`.
   */
  abstract getRecentMessages(count: number): Promise<Msg[]>;

  abstract getMessagesByRole(role: Role): Promise<Msg[]>;

  abstract size(): Promise<number>;

  abstract clear(): Promise<void>;

  abstract removeMessage(messageId: string): Promise<boolean>;

  /**
   * Remove every message created strictly before `timestamp`.
   *
   * @returns the number of messages removed
   */
  abstract removeMessagesOlderThan(timestamp: string): Promise<number>;

  /**
   * Atomically replace the whole content of the store.
   */
  protected abstract replaceMessages(messages: readonly Msg[]): Promise<void>;

  async addMessages(messages: readonly Msg[]): Promise<void> {
    for (const message of messages) {
      await this.addMessage(message);
    }
  }

  async isEmpty(): Promise<boolean> {
    return (await this.size()) === 0;
  }

  async getFirstMessage(): Promise<Msg | undefined> {
    const messages = await this.getMessages();
    return messages[0];
  }

  async getLastMessage(): Promise<Msg | undefined> {
    const messages = await this.getMessages();
    return messages[messages.length - 1];
  }

  async getEstimatedTokenCount(): Promise<number> {
    return estimateTokenCount(await this.getMessages());
  }

  async searchMessages(searchText: string, caseSensitive = false): Promise<Msg[]> {
    const needle = caseSensitive ? searchText : searchText.toLowerCase();
    const messages = await this.getMessages();
    return messages.filter(msg => {
      const text = msg.getTextContent();
      if (text === null) {
        return false;
      }
      return (caseSensitive ? text : text.toLowerCase()).includes(needle);
    });
  }

  async getMemoryStats(): Promise<MemoryStats> {
    return this.computeStats(await this.getMessages());
  }

  async exportMemory(): Promise<MemoryExport> {
    const messages = await this.getMessages();
    return {
      messages: messages.map(msg => msg.toDict()),
      metadata: this.computeStats(messages),
      exportedAt: new Date().toISOString(),
    };
  }

  /**
   * Replace the store's content with the messages of an export.
   */
  async importMemory(data: unknown): Promise<void> {
    const parsed = memoryImportSchema.parse(data);
    await this.replaceMessages(parsed.messages.map(entry => Msg.fromDict(entry)));
  }

  async createSnapshot(): Promise<MemorySnapshot> {
    const messages = await this.getMessages();
    return Object.freeze({
      messages: Object.freeze([...messages]),
      metadata: this.computeStats(messages),
      timestamp: new Date().toISOString(),
    });
  }

  async restoreFromSnapshot(snapshot: MemorySnapshot): Promise<void> {
    await this.replaceMessages(snapshot.messages);
  }

  private computeStats(messages: readonly Msg[]): MemoryStats {
    const roleCounts: Record<Role, number> = { user: 0, assistant: 0, system: 0 };
    for (const msg of messages) {
      roleCounts[msg.role] += 1;
    }
    return {
      totalMessages: messages.length,
      estimatedTokens: estimateTokenCount(messages),
      roleCounts,
      isEmpty: messages.length === 0,
      memoryType: this.constructor.name,
    };
  }
}
