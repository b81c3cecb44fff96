/**
 * Tessera SDK - In-Memory Message Store
 *
 * Bounded, ordered log of messages behind a shared-read / exclusive-write lock.
 * Insertion order is the only order: it drives recent-N, first and last.
 */

import { defaultLogger } from '../../core/logger.js';
import { ValidationError } from '../errors.js';
import type { Msg, Role } from '../message/msg.js';
import type { Logger } from '../types.js';
import { ReadWriteLock } from '../utils/rw-lock.js';
import { MemoryBase, type MessageFilter } from './memory-base.js';

export interface InMemoryMemoryOptions {
  /** Capacity bound (default 1000) */
  maxMessages?: number;

  /** Evict the oldest message on overflow instead of rejecting the new one (default true) */
  autoTruncate?: boolean;

  logger?: Logger;
}

const DEFAULT_MAX_MESSAGES = 1000;

/**
 * Parse an ISO-8601 timestamp to epoch millis; null when malformed.
 */
function toEpoch(timestamp: string): number | null {
  const value = Date.parse(timestamp);
  return Number.isNaN(value) ? null : value;
}

/**
 * True when `timestamp` is strictly before `reference`. Malformed input never matches.
 */
function isOlderThan(timestamp: string, reference: string): boolean {
  const time = toEpoch(timestamp);
  const ref = toEpoch(reference);
  return time !== null && ref !== null && time < ref;
}

function assertCapacity(value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`maxMessages must be a positive integer (got ${value})`);
  }
}

export class InMemoryMemory extends MemoryBase {
  private messages: Msg[] = [];
  private maxMessages: number;
  private autoTruncate: boolean;
  private readonly lock = new ReadWriteLock();
  private readonly logger: Logger;

  constructor(options: InMemoryMemoryOptions = {}) {
    super();
    this.maxMessages = options.maxMessages ?? DEFAULT_MAX_MESSAGES;
    assertCapacity(this.maxMessages);
    this.autoTruncate = options.autoTruncate ?? true;
    this.logger = options.logger ?? defaultLogger();

    this.logger.debug('Initialized InMemoryMemory', {
      maxMessages: this.maxMessages,
      autoTruncate: this.autoTruncate,
    });
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  addMessage(message: Msg): Promise<boolean> {
    return this.lock.write(() => {
      if (!this.autoTruncate && this.messages.length >= this.maxMessages) {
        this.logger.warn('Memory full, message rejected', {
          messageId: message.id,
          maxMessages: this.maxMessages,
        });
        return false;
      }

      this.messages.push(message);
      this.logger.debug('Added message to memory', { messageId: message.id, role: message.role });

      if (this.messages.length > this.maxMessages) {
        const removed = this.messages.shift();
        this.logger.debug('Auto-truncated old message', { messageId: removed?.id });
      }
      return true;
    });
  }

  clear(): Promise<void> {
    return this.lock.write(() => {
      const count = this.messages.length;
      this.messages = [];
      this.logger.info(`Cleared ${count} messages from memory`);
    });
  }

  removeMessage(messageId: string): Promise<boolean> {
    return this.lock.write(() => {
      const index = this.messages.findIndex(msg => msg.id === messageId);
      if (index === -1) {
        return false;
      }
      this.messages.splice(index, 1);
      this.logger.debug('Removed message from memory', { messageId });
      return true;
    });
  }

  removeMessagesOlderThan(timestamp: string): Promise<number> {
    return this.lock.write(() => {
      const before = this.messages.length;
      this.messages = this.messages.filter(msg => !isOlderThan(msg.timestamp, timestamp));
      const removed = before - this.messages.length;
      if (removed > 0) {
        this.logger.info(`Removed ${removed} messages older than ${timestamp}`);
      }
      return removed;
    });
  }

  /**
   * Keep only the last `keepCount` messages.
   *
   * @returns the number of messages removed
   */
  truncateToRecent(keepCount: number): Promise<number> {
    return this.lock.write(() => this.truncateUnlocked(keepCount));
  }

  /**
   * Change the capacity; shrinking below the current size truncates when auto-truncate is on.
   */
  setMaxMessages(maxMessages: number): Promise<void> {
    assertCapacity(maxMessages);
    return this.lock.write(() => {
      this.maxMessages = maxMessages;
      if (this.autoTruncate && this.messages.length > maxMessages) {
        this.truncateUnlocked(maxMessages);
      }
    });
  }

  setAutoTruncate(autoTruncate: boolean): Promise<void> {
    return this.lock.write(() => {
      this.autoTruncate = autoTruncate;
    });
  }

  protected replaceMessages(messages: readonly Msg[]): Promise<void> {
    return this.lock.write(() => {
      let next = [...messages];
      if (next.length > this.maxMessages) {
        this.logger.warn('Replacement exceeds capacity', {
          received: next.length,
          maxMessages: this.maxMessages,
          kept: this.autoTruncate ? 'most recent' : 'oldest',
        });
        next = this.autoTruncate ? next.slice(next.length - this.maxMessages) : next.slice(0, this.maxMessages);
      }
      this.messages = next;
    });
  }

  private truncateUnlocked(keepCount: number): number {
    if (keepCount < 0 || this.messages.length <= keepCount) {
      return 0;
    }
    const removed = this.messages.length - keepCount;
    this.messages = this.messages.slice(removed);
    this.logger.info(`Truncated memory: kept ${keepCount} recent messages, removed ${removed}`);
    return removed;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  getMessages(filter?: MessageFilter): Promise<Msg[]> {
    return this.lock.read(() =>
      filter === undefined ? [...this.messages] : this.messages.filter(msg => matchesFilter(msg, filter))
    );
  }

  getRecentMessages(count: number): Promise<Msg[]> {
    return this.lock.read(() => (count <= 0 ? [] : this.messages.slice(-count)));
  }

  getMessagesByRole(role: Role): Promise<Msg[]> {
    return this.lock.read(() => this.messages.filter(msg => msg.role === role));
  }

  getMessagesBySender(name: string): Promise<Msg[]> {
    return this.lock.read(() => this.messages.filter(msg => msg.name === name));
  }

  /**
   * Messages whose timestamp lies within [start, end], both inclusive.
   */
  getMessagesInTimeRange(start: string, end: string): Promise<Msg[]> {
    const from = toEpoch(start);
    const to = toEpoch(end);
    return this.lock.read(() => {
      if (from === null || to === null) {
        return [];
      }
      return this.messages.filter(msg => {
        const time = toEpoch(msg.timestamp);
        return time !== null && time >= from && time <= to;
      });
    });
  }

  size(): Promise<number> {
    return this.lock.read(() => this.messages.length);
  }

  getMaxMessages(): number {
    return this.maxMessages;
  }

  isAutoTruncate(): boolean {
    return this.autoTruncate;
  }
}

function matchesFilter(msg: Msg, filter: MessageFilter): boolean {
  if (filter.role !== undefined && msg.role !== filter.role) {
    return false;
  }
  if (filter.name !== undefined && msg.name !== filter.name) {
    return false;
  }
  if (filter.containsText !== undefined) {
    const text = msg.getTextContent();
    if (text === null || !text.includes(filter.containsText)) {
      return false;
    }
  }
  if (filter.after !== undefined) {
    const time = toEpoch(msg.timestamp);
    const after = toEpoch(filter.after);
    if (time === null || after === null || time < after) {
      return false;
    }
  }
  if (filter.before !== undefined && !isOlderThan(msg.timestamp, filter.before)) {
    return false;
  }
  return true;
}

/**
 * Create an in-memory store with the given options.
 */
export function createInMemoryMemory(options?: InMemoryMemoryOptions): InMemoryMemory {
  return new InMemoryMemory(options);
}
