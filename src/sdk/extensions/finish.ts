/**
 * Finish Tool - Signal task completion
 *
 * The model calls this with its final answer. The agent recognizes the call by
 * name and ends the reply with `response` as the final message, so the
 * function below only runs when something invokes the tool directly.
 *
 * @example
 * Model tool call: generate_response({"response": "Created proof.txt with the requested content."})
 */

import { z } from 'zod';
import { defineTool, type ToolDefinition } from '../tool.js';
import { ToolResponse } from '../tool-response.js';

export const FINISH_TOOL_NAME = 'generate_response';

export const finishInputSchema = z.object({ response: z.string() });

export function createFinishTool(): ToolDefinition {
  return defineTool({
    name: FINISH_TOOL_NAME,
    description:
      'Signal that the task is complete and give the final answer. Use when all requested work is done. ' +
      'The response becomes the final result message.',
    parameters: {
      type: 'object',
      properties: {
        response: { type: 'string', description: 'The final answer shown to the user' },
      },
      required: ['response'],
    },
    input: finishInputSchema,
    execute: ({ response }) => ToolResponse.success(response, { terminate: true, reason: 'completed' }),
  });
}

/**
 * Pull the final answer out of a finish call's input; undefined when it has none.
 */
export function extractFinishResponse(input: Record<string, unknown>): string | undefined {
  const parsed = finishInputSchema.safeParse(input);
  return parsed.success ? parsed.data.response : undefined;
}
