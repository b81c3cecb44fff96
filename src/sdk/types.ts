/**
 * Tessera SDK - Core Type Definitions
 *
 * Shapes shared by the toolkit, the model and formatter contracts, and the
 * agents. Message and content-block types live in ./message.
 */

// ============================================================================
// Logger Interface (for DX)
// ============================================================================

/**
 * Logger - Structured logging for developer observability.
 */
export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;

  /** Start a timed operation; call the returned function to log its duration */
  startTimer: (label: string) => () => void;
}

// ============================================================================
// Tool Schema Types
// ============================================================================

/**
 * JSON-schema-like description of a tool's parameters.
 *
 * Kept deliberately open: providers accept arbitrary JSON Schema here.
 */
export interface JsonSchemaObject {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
  [key: string]: unknown;
}

/**
 * ToolSchema - The function description surfaced to the model.
 */
export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: JsonSchemaObject;
  };
}

// ============================================================================
// Model Invocation Types
// ============================================================================

export const TOOL_CHOICE_MODES = ['auto', 'none', 'any', 'required'] as const;

export type ToolChoiceMode = (typeof TOOL_CHOICE_MODES)[number];

/**
 * ToolChoice - One of the generic modes, or the name of a specific tool.
 */
export type ToolChoice = ToolChoiceMode | (string & {});

/**
 * Open key/value options for a model call. `signal` cancels the request.
 */
export interface ModelCallOptions {
  signal?: AbortSignal;
  [key: string]: unknown;
}

// ============================================================================
// Long-Term Memory Types
// ============================================================================

export const LONG_TERM_MEMORY_MODES = ['agent_control', 'static_control', 'both'] as const;

/**
 * How long-term memory is wired around the loop:
 * - static_control: retrieve before and record after every reply automatically
 * - agent_control: expose retrieve/record as tools the model may call
 * - both: all of the above
 */
export type LongTermMemoryMode = (typeof LONG_TERM_MEMORY_MODES)[number];

export function isLongTermMemoryMode(value: unknown): value is LongTermMemoryMode {
  return typeof value === 'string' && LONG_TERM_MEMORY_MODES.some(mode => mode === value);
}

// ============================================================================
// Orchestrator Types
// ============================================================================

/**
 * AgentPhase - Where the agent currently is in its reply state machine.
 */
export type AgentPhase =
  | 'idle'
  | 'observing'
  | 'reasoning'
  | 'acting'
  | 'finished'
  | 'interrupted'
  | 'errored';

/**
 * Why did the last reply terminate?
 */
export type TerminationReason = 'completed' | 'max_iterations' | 'interrupted' | 'error';

/**
 * AgentState - Snapshot of the agent's loop state.
 */
export interface AgentState {
  /** Current phase */
  phase: AgentPhase;

  /** Reasoning iterations performed by the current or last reply */
  iteration: number;

  /** Is a reply in flight? */
  running: boolean;

  /** How the last reply ended */
  terminationReason?: TerminationReason;
}
