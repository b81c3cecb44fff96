/**
 * Tessera SDK - Toolkit
 *
 * Registry and dispatcher for the tools an agent may call. Every failure a
 * tool can produce (unknown name, bad input, thrown error, timeout) comes
 * back as an error-kind ToolResponse; the toolkit itself only rejects when
 * the caller's abort signal fires.
 */

import { defaultLogger } from '../core/logger.js';
import { errorMessage, InterruptedError, TimeoutError } from './errors.js';
import { createCurrentTimeTool } from './extensions/current-time.js';
import { createEchoTool } from './extensions/echo.js';
import { toolResultBlock, type ToolResultBlock, type ToolUseBlock } from './message/content-blocks.js';
import { defineTool, type ToolContext, type ToolDefinition, type ToolFunction } from './tool.js';
import { ToolResponse } from './tool-response.js';
import type { JsonSchemaObject, Logger, ToolSchema } from './types.js';
import { throwIfAborted, withTimeout } from './utils/async.js';

export interface ToolkitOptions {
  logger?: Logger;

  /** Per-call time bound in milliseconds (default 30000) */
  executionTimeoutMs?: number;

  /** Run calls as cancellable, time-bounded units (default true) */
  enableAsync?: boolean;

  /** Register echo and get_current_time at construction (default true) */
  registerBuiltins?: boolean;
}

export interface ExecuteOptions {
  /** Cancels the call; the toolkit rejects with InterruptedError when it fires */
  signal?: AbortSignal;
  callId?: string;
}

/**
 * ToolCallOutcome - One dispatched tool_use block and what it produced.
 */
export interface ToolCallOutcome {
  call: ToolUseBlock;
  response: ToolResponse;
}

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

/**
 * Toolkit - Central registry for all agent tools.
 *
 * Responsibilities:
 * - Register tools by name (re-registration replaces)
 * - Surface tool schemas to the model
 * - Execute calls with failure isolation and timeouts
 * - Fan out a turn's calls sequentially or in parallel, keeping call order
 */
export class Toolkit {
  private tools: Map<string, ToolDefinition> = new Map();
  private logger: Logger;
  private executionTimeoutMs: number;
  private enableAsync: boolean;

  constructor(options: ToolkitOptions = {}) {
    this.logger = options.logger ?? defaultLogger();
    this.executionTimeoutMs = options.executionTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.enableAsync = options.enableAsync ?? true;

    if (options.registerBuiltins ?? true) {
      this.register(createEchoTool());
      this.register(createCurrentTimeTool());
    }
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Register a tool, replacing any tool already registered under its name.
   */
  register(tool: ToolDefinition): void;
  register(name: string, fn: ToolFunction, description: string, parameters?: JsonSchemaObject): void;
  register(
    toolOrName: ToolDefinition | string,
    fn?: ToolFunction,
    description = '',
    parameters?: JsonSchemaObject
  ): void {
    const tool =
      typeof toolOrName === 'string'
        ? defineTool({ name: toolOrName, description, parameters, execute: fn ?? missingFunction(toolOrName) })
        : toolOrName;

    const replaced = this.tools.has(tool.name);
    this.tools.set(tool.name, tool);

    this.logger.debug(`${replaced ? 'Replaced' : 'Registered'} tool: ${tool.name}`, {
      description: tool.description,
    });
  }

  /**
   * Register multiple tools at once.
   */
  registerAll(tools: readonly ToolDefinition[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  unregister(name: string): boolean {
    const removed = this.tools.delete(name);
    if (removed) {
      this.logger.debug(`Unregistered tool: ${name}`);
    }
    return removed;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  /**
   * Registered tool names in registration order.
   */
  list(): string[] {
    return Array.from(this.tools.keys());
  }

  clear(): void {
    this.tools.clear();
    this.logger.debug('Cleared all tools');
  }

  getToolSchema(name: string): ToolSchema | undefined {
    const tool = this.tools.get(name);
    return tool ? toSchema(tool) : undefined;
  }

  getToolSchemas(): ToolSchema[] {
    return Array.from(this.tools.values(), toSchema);
  }

  setExecutionTimeout(timeoutMs: number): void {
    this.executionTimeoutMs = timeoutMs;
  }

  getExecutionTimeout(): number {
    return this.executionTimeoutMs;
  }

  setAsyncExecution(enabled: boolean): void {
    this.enableAsync = enabled;
  }

  isAsyncExecution(): boolean {
    return this.enableAsync;
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Execute one tool call.
   *
   * Never rejects for a tool's own failure. Rejects with InterruptedError
   * when `options.signal` fires before or during the call.
   */
  async execute(
    name: string,
    input: Record<string, unknown> = {},
    options: ExecuteOptions = {}
  ): Promise<ToolResponse> {
    const { signal, callId } = options;
    throwIfAborted(signal);

    const tool = this.tools.get(name);
    if (!tool) {
      this.logger.warn(`Tool not found: ${name}`, { available: this.list() });
      return ToolResponse.error(`Tool '${name}' not found`, 'TOOL_NOT_FOUND');
    }

    const timer = this.logger.startTimer(`tool:${name}`);
    this.logger.info(`Executing ${name}`, { callId, input });

    try {
      const response = this.enableAsync
        ? await withTimeout(
            `Tool '${name}'`,
            this.executionTimeoutMs,
            childSignal => tool.invoke(input, this.createContext(name, childSignal, callId)),
            signal
          )
        : await tool.invoke(input, this.createContext(name, signal ?? new AbortController().signal, callId));

      this.logger.info(`${name} completed`, {
        callId,
        error: response.isError(),
        outputPreview: response.getContentAsString().substring(0, 100),
      });
      return response;
    } catch (error) {
      if (error instanceof InterruptedError && signal?.aborted) {
        this.logger.info(`${name} interrupted`, { callId });
        throw error;
      }
      if (error instanceof TimeoutError) {
        this.logger.warn(`${name} timed out`, { callId, timeoutMs: error.timeoutMs });
        return ToolResponse.error(error.message, 'TIMEOUT');
      }

      this.logger.error(`Execution error in ${name}`, {
        callId,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return ToolResponse.error(errorMessage(error), 'EXECUTION_ERROR');
    } finally {
      timer();
    }
  }

  /**
   * Dispatch every tool_use block of one model turn.
   *
   * In parallel mode all calls start together, each with its own time bound;
   * either way the outcomes come back in the order of `calls`.
   */
  async executeToolCalls(
    calls: readonly ToolUseBlock[],
    options: { parallel?: boolean; signal?: AbortSignal } = {}
  ): Promise<ToolCallOutcome[]> {
    const { parallel = false, signal } = options;
    const run = async (call: ToolUseBlock): Promise<ToolCallOutcome> => ({
      call,
      response: await this.execute(call.name, call.input, { signal, callId: call.id }),
    });

    if (parallel) {
      this.logger.debug('Dispatching tool calls in parallel', { count: calls.length });
      return Promise.all(calls.map(run));
    }

    const outcomes: ToolCallOutcome[] = [];
    for (const call of calls) {
      throwIfAborted(signal);
      outcomes.push(await run(call));
    }
    return outcomes;
  }

  /**
   * Get toolkit statistics for observability.
   */
  getStats(): {
    toolCount: number;
    tools: string[];
    executionTimeoutMs: number;
    enableAsync: boolean;
  } {
    return {
      toolCount: this.tools.size,
      tools: this.list(),
      executionTimeoutMs: this.executionTimeoutMs,
      enableAsync: this.enableAsync,
    };
  }

  private createContext(toolName: string, signal: AbortSignal, callId?: string): ToolContext {
    return { signal, toolName, callId, logger: this.logger };
  }
}

/**
 * Wrap an outcome as the tool_result block correlated with its call.
 */
export function toToolResultBlock(outcome: ToolCallOutcome): ToolResultBlock {
  return toolResultBlock(outcome.call.id, outcome.response.content, outcome.call.name);
}

function toSchema(tool: ToolDefinition): ToolSchema {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

function missingFunction(name: string): ToolFunction {
  return () => ToolResponse.error(`Tool '${name}' has no function`, 'EXECUTION_ERROR');
}

/**
 * Create a toolkit with the built-in tools registered.
 */
export function createToolkit(options?: ToolkitOptions): Toolkit {
  return new Toolkit(options);
}
