/**
 * Echo Tool - Return the given message verbatim
 */

import { z } from 'zod';
import { defineTool, type ToolDefinition } from '../tool.js';
import { ToolResponse } from '../tool-response.js';

export const ECHO_TOOL_NAME = 'echo';

export function createEchoTool(): ToolDefinition {
  return defineTool({
    name: ECHO_TOOL_NAME,
    description: 'Echo back the provided message.',
    parameters: {
      type: 'object',
      properties: {
        message: { type: 'string', description: 'The message to echo back' },
      },
      required: ['message'],
    },
    input: z.object({ message: z.string() }),
    execute: ({ message }) => ToolResponse.success(message),
  });
}
