/**
 * Tessera SDK - Long-Term Memory
 *
 * Knowledge kept across replies. The agent consults it automatically in
 * static-control mode and exposes it as tools in agent-control mode; storage
 * and ranking are up to the backend.
 */

import { randomUUID } from 'node:crypto';

export interface LongTermMemoryEntry {
  key: string;
  value: string;
  metadata: Record<string, unknown>;
  createdAt: string;
}

export interface LongTermMemory {
  /** Insert or overwrite the entry under `key`. */
  store(key: string, value: string, metadata?: Record<string, unknown>): Promise<void>;

  retrieve(key: string): Promise<LongTermMemoryEntry | undefined>;

  /** Entries relevant to `query`, most relevant first. */
  search(query: string, limit?: number): Promise<LongTermMemoryEntry[]>;
}

const DEFAULT_SEARCH_LIMIT = 10;

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(word => word.length > 1);
}

/**
 * InMemoryLongTermMemory - Process-local backend ranking entries by keyword overlap.
 */
export class InMemoryLongTermMemory implements LongTermMemory {
  private entries = new Map<string, LongTermMemoryEntry>();

  async store(key: string, value: string, metadata: Record<string, unknown> = {}): Promise<void> {
    this.entries.set(key, { key, value, metadata: { ...metadata }, createdAt: new Date().toISOString() });
  }

  async retrieve(key: string): Promise<LongTermMemoryEntry | undefined> {
    return this.entries.get(key);
  }

  /**
   * Score = number of distinct query words found in the entry's value.
   * Ties keep insertion order; entries scoring zero are left out.
   */
  async search(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<LongTermMemoryEntry[]> {
    const words = [...new Set(tokenize(query))];
    if (words.length === 0 || limit <= 0) {
      return [];
    }

    return [...this.entries.values()]
      .map(entry => {
        const haystack = new Set(tokenize(entry.value));
        return { entry, score: words.filter(word => haystack.has(word)).length };
      })
      .filter(({ score }) => score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(({ entry }) => entry);
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}

/**
 * Generate a key for an entry recorded without one.
 */
export function generateMemoryKey(): string {
  return `ltm_${randomUUID()}`;
}
