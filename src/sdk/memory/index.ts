/**
 * Tessera SDK - Memory System
 *
 * Conversational memory (bounded message log) and long-term memory backends.
 */

export { MemoryBase } from './memory-base.js';
export type { MemoryExport, MemorySnapshot, MemoryStats, MessageFilter } from './memory-base.js';

export { InMemoryMemory, createInMemoryMemory } from './in-memory.js';
export type { InMemoryMemoryOptions } from './in-memory.js';

export { InMemoryLongTermMemory, generateMemoryKey } from './long-term.js';
export type { LongTermMemory, LongTermMemoryEntry } from './long-term.js';
