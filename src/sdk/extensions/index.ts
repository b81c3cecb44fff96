/**
 * Tessera SDK - Built-in Tools
 */

export { createEchoTool, ECHO_TOOL_NAME } from './echo.js';
export { createCurrentTimeTool, CURRENT_TIME_TOOL_NAME } from './current-time.js';
export { createFinishTool, extractFinishResponse, FINISH_TOOL_NAME } from './finish.js';
export {
  createLongTermMemoryTools,
  createRecordToMemoryTool,
  createRetrieveFromMemoryTool,
  RECORD_MEMORY_TOOL_NAME,
  RETRIEVE_MEMORY_TOOL_NAME,
} from './long-term-memory.js';
