/**
 * Long-Term Memory Tools - Let the model search and record durable knowledge
 *
 * Registered by the agent when its long-term memory mode is agent_control or both.
 */

import { z } from 'zod';
import { generateMemoryKey, type LongTermMemory } from '../memory/long-term.js';
import { defineTool, type ToolDefinition } from '../tool.js';
import { ToolResponse } from '../tool-response.js';

export const RETRIEVE_MEMORY_TOOL_NAME = 'retrieve_from_memory';
export const RECORD_MEMORY_TOOL_NAME = 'record_to_memory';

const DEFAULT_RETRIEVE_LIMIT = 5;

export function createRetrieveFromMemoryTool(memory: LongTermMemory): ToolDefinition {
  return defineTool({
    name: RETRIEVE_MEMORY_TOOL_NAME,
    description: 'Search long-term memory for information relevant to a query.',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'What to look for' },
        limit: { type: 'integer', description: `Maximum number of entries (default ${DEFAULT_RETRIEVE_LIMIT})` },
      },
      required: ['query'],
    },
    input: z.object({
      query: z.string().min(1),
      limit: z.number().int().positive().optional(),
    }),
    execute: async ({ query, limit }) => {
      const entries = await memory.search(query, limit ?? DEFAULT_RETRIEVE_LIMIT);
      if (entries.length === 0) {
        return ToolResponse.success(`No memories found for "${query}".`);
      }
      return ToolResponse.success(entries.map(entry => `- ${entry.value}`).join('\n'), {
        keys: entries.map(entry => entry.key),
      });
    },
  });
}

export function createRecordToMemoryTool(memory: LongTermMemory): ToolDefinition {
  return defineTool({
    name: RECORD_MEMORY_TOOL_NAME,
    description: 'Record a piece of information to long-term memory for later replies.',
    parameters: {
      type: 'object',
      properties: {
        content: { type: 'string', description: 'The information to remember' },
        key: { type: 'string', description: 'Optional key; reusing a key overwrites the entry' },
      },
      required: ['content'],
    },
    input: z.object({
      content: z.string().min(1),
      key: z.string().min(1).optional(),
    }),
    execute: async ({ content, key }, context) => {
      const entryKey = key ?? generateMemoryKey();
      await memory.store(entryKey, content, { source: 'agent', callId: context.callId });
      return ToolResponse.success(`Recorded to memory under "${entryKey}".`, { key: entryKey });
    },
  });
}

export function createLongTermMemoryTools(memory: LongTermMemory): ToolDefinition[] {
  return [createRetrieveFromMemoryTool(memory), createRecordToMemoryTool(memory)];
}
