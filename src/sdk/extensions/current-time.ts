/**
 * Current Time Tool - Report the present timestamp as ISO-8601 text
 */

import { defineTool, type ToolDefinition } from '../tool.js';
import { ToolResponse } from '../tool-response.js';

export const CURRENT_TIME_TOOL_NAME = 'get_current_time';

export function createCurrentTimeTool(now: () => Date = () => new Date()): ToolDefinition {
  return defineTool({
    name: CURRENT_TIME_TOOL_NAME,
    description: 'Get the current date and time (ISO-8601).',
    execute: () => ToolResponse.success(now().toISOString()),
  });
}
