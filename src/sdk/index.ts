/**
 * Tessera SDK - Main Entry Point
 *
 * A bounded reasoning-acting agent loop: messages, memory, a toolkit, model
 * and formatter contracts, and lifecycle hooks.
 */

// Core SDK components
export {
  ReActAgent,
  createReActAgent,
  DEFAULT_MAX_ITERS,
  LOOP_ERROR_PREFIX,
  MAX_ITERATIONS_TEXT,
  REACT_AGENT_KIND,
} from './orchestrator.js';
export type { ReActAgentOptions } from './orchestrator.js';
export { Toolkit, createToolkit, toToolResultBlock, DEFAULT_TOOL_TIMEOUT_MS } from './registry.js';
export type { ExecuteOptions, ToolCallOutcome, ToolkitOptions } from './registry.js';
export { defineTool, EMPTY_PARAMETERS } from './tool.js';
export type { ToolContext, ToolDefinition, ToolFunction, TypedToolSpec, UntypedToolSpec } from './tool.js';
export { ToolResponse } from './tool-response.js';
export type { ToolResponseContent, ToolResponseDict } from './tool-response.js';

// Hooks
export { HookRegistry, HOOK_TYPES, isHookType } from './hooks.js';
export type {
  HookFunction,
  HookKwargs,
  HookResults,
  HookType,
  ObserveKwargs,
  PostHookType,
  PreHookType,
  PrintKwargs,
  ReplyKwargs,
} from './hooks.js';

// Messages
export * from './message/index.js';

// Models & formatters
export * from './model/index.js';
export * from './formatter/index.js';

// Extensions
export * from './extensions/index.js';

// Memory
export * from './memory/index.js';

// Agents
export * from './agents/index.js';

// Errors
export {
  ConfigError,
  errorMessage,
  InterruptedError,
  ModelError,
  TesseraError,
  TimeoutError,
  ValidationError,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Types
export { isLongTermMemoryMode, LONG_TERM_MEMORY_MODES, TOOL_CHOICE_MODES } from './types.js';
export type {
  AgentPhase,
  AgentState,
  JsonSchemaObject,
  Logger,
  LongTermMemoryMode,
  ModelCallOptions,
  TerminationReason,
  ToolChoice,
  ToolChoiceMode,
  ToolSchema,
} from './types.js';

// Version
export const SDK_VERSION = '0.1.0';
