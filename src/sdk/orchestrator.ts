/**
 * Tessera SDK - ReAct Orchestrator
 *
 * The reasoning-acting loop: invoke the model with the system prompt and
 * memory, dispatch the tools it asks for, feed the results back, and repeat
 * until it answers, calls the finish tool, or runs out of iterations.
 *
 * ```
 * 1: observe input; retrieve long-term context (static control)
 * 2: while iteration < maxIters do
 * 3:   call model with system prompt + context + memory
 * 4:   if finish call, or text without tool calls: store answer, return
 * 5:   store assistant message; dispatch tool calls
 * 6:   store one message carrying every tool_result
 * 7: end while
 * 8: return the max-iterations message
 * ```
 */

import { errorMessage, InterruptedError, ValidationError } from './errors.js';
import { createLongTermMemoryTools } from './extensions/long-term-memory.js';
import { createFinishTool, extractFinishResponse, FINISH_TOOL_NAME } from './extensions/finish.js';
import { AgentBase, type AgentBaseOptions } from './agents/agent-base.js';
import { InMemoryMemory } from './memory/in-memory.js';
import type { MemoryBase } from './memory/memory-base.js';
import { generateMemoryKey, type LongTermMemory } from './memory/long-term.js';
import { textBlock, type ToolUseBlock } from './message/content-blocks.js';
import { Msg } from './message/msg.js';
import type { ChatModel } from './model/chat-model.js';
import type { ChatResponse } from './model/chat-response.js';
import { createToolkit, toToolResultBlock, type ToolCallOutcome, type Toolkit } from './registry.js';
import {
  isLongTermMemoryMode,
  LONG_TERM_MEMORY_MODES,
  type AgentPhase,
  type AgentState,
  type LongTermMemoryMode,
  type TerminationReason,
  type ToolChoice,
} from './types.js';
import { raceAbort, throwIfAborted, withTimeout } from './utils/async.js';

export const REACT_AGENT_KIND = 'ReActAgent';
export const DEFAULT_MAX_ITERS = 10;
export const MAX_ITERATIONS_TEXT = 'Maximum iterations reached without completion.';
export const LOOP_ERROR_PREFIX = 'Error in reasoning-acting loop: ';

/**
 * ReActAgentOptions - Configuration for the agent.
 */
export interface ReActAgentOptions extends AgentBaseOptions {
  /** Model backend */
  model: ChatModel;

  /** Prepended to every model call as a system message */
  sysPrompt?: string;

  /** Tools the model may call; the finish tool is added (default: built-ins only) */
  toolkit?: Toolkit;

  /** Conversation memory (default: an InMemoryMemory) */
  memory?: MemoryBase;

  longTermMemory?: LongTermMemory;

  /** One of agent_control, static_control, both (default both); anything else throws */
  longTermMemoryMode?: string;

  /** Dispatch a turn's tool calls concurrently (default false) */
  parallelToolCalls?: boolean;

  /** Upper bound on reasoning iterations per reply (default 10) */
  maxIters?: number;

  /** Time bound on each model call; unbounded when omitted */
  modelTimeoutMs?: number;

  toolChoice?: ToolChoice;
}

/**
 * How one model response moves the loop.
 */
type ReasoningOutcome =
  | { kind: 'finish'; message: Msg }
  | { kind: 'act'; message: Msg; calls: ToolUseBlock[] }
  | { kind: 'continue'; message: Msg };

/**
 * ReActAgent - Reasoning-acting agent over a ChatModel and a Toolkit.
 */
export class ReActAgent extends AgentBase {
  readonly kind: string = REACT_AGENT_KIND;

  readonly model: ChatModel;
  readonly toolkit: Toolkit;
  readonly memory: MemoryBase;
  readonly longTermMemory?: LongTermMemory;
  readonly longTermMemoryMode: LongTermMemoryMode;

  private sysPrompt?: string;
  private parallelToolCalls: boolean;
  private maxIters: number;
  private modelTimeoutMs?: number;
  private toolChoice?: ToolChoice;

  private state: AgentState = { phase: 'idle', iteration: 0, running: false };

  constructor(options: ReActAgentOptions) {
    super(options);

    const mode = options.longTermMemoryMode ?? 'both';
    if (!isLongTermMemoryMode(mode)) {
      throw new ValidationError(
        `Invalid long-term memory mode "${mode}". Expected one of: ${LONG_TERM_MEMORY_MODES.join(', ')}`
      );
    }
    const maxIters = options.maxIters ?? DEFAULT_MAX_ITERS;
    if (!Number.isInteger(maxIters) || maxIters < 1) {
      throw new ValidationError(`maxIters must be a positive integer (got ${maxIters})`);
    }

    this.model = options.model;
    this.toolkit = options.toolkit ?? createToolkit({ logger: this.logger });
    this.memory = options.memory ?? new InMemoryMemory({ logger: this.logger });
    this.longTermMemory = options.longTermMemory;
    this.longTermMemoryMode = mode;
    this.sysPrompt = options.sysPrompt;
    this.parallelToolCalls = options.parallelToolCalls ?? false;
    this.maxIters = maxIters;
    this.modelTimeoutMs = options.modelTimeoutMs;
    this.toolChoice = options.toolChoice;

    this.toolkit.register(createFinishTool());
    if (this.longTermMemory && this.agentControl) {
      this.toolkit.registerAll(createLongTermMemoryTools(this.longTermMemory));
    }

    this.logger.debug('Initialized ReActAgent', {
      name: this.name,
      model: this.model.modelName,
      tools: this.toolkit.list(),
      longTermMemoryMode: this.longTermMemoryMode,
      maxIters: this.maxIters,
    });
  }

  private get staticControl(): boolean {
    return this.longTermMemoryMode !== 'agent_control';
  }

  private get agentControl(): boolean {
    return this.longTermMemoryMode !== 'static_control';
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getState(): AgentState {
    return { ...this.state };
  }

  getSysPrompt(): string | undefined {
    return this.sysPrompt;
  }

  setSysPrompt(sysPrompt: string | undefined): void {
    this.sysPrompt = sysPrompt;
  }

  getMaxIters(): number {
    return this.maxIters;
  }

  setMaxIters(maxIters: number): void {
    if (!Number.isInteger(maxIters) || maxIters < 1) {
      throw new ValidationError(`maxIters must be a positive integer (got ${maxIters})`);
    }
    this.maxIters = maxIters;
  }

  setParallelToolCalls(enabled: boolean): void {
    this.parallelToolCalls = enabled;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  protected async doObserve(msg: Msg | Msg[] | undefined): Promise<void> {
    if (msg === undefined) {
      return;
    }
    const messages = Array.isArray(msg) ? msg : [msg];
    for (const message of messages) {
      await this.memory.addMessage(message);
    }
  }

  protected override async handleInterrupt(input: Msg | undefined): Promise<Msg> {
    const message = await super.handleInterrupt(input);
    await this.memory.addMessage(message);
    this.setPhase('interrupted');
    this.state.running = false;
    this.state.terminationReason = 'interrupted';
    this.logger.info('Reply interrupted', { agent: this.name, iteration: this.state.iteration });
    return message;
  }

  protected async doReply(msg: Msg | undefined, signal: AbortSignal): Promise<Msg> {
    const timer = this.logger.startTimer('agent:reply');
    this.state = { phase: 'observing', iteration: 0, running: true };

    try {
      await this.observe(msg);
      const context = await this.retrieveLongTermContext(msg);
      return await this.reasonAndAct(msg, context, signal);
    } catch (error) {
      if (error instanceof InterruptedError && signal.aborted) {
        throw error;
      }
      this.logger.error('Error in reasoning-acting loop', {
        agent: this.name,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      this.terminate('errored', 'error');
      return new Msg(this.name, `${LOOP_ERROR_PREFIX}${errorMessage(error)}`, 'assistant', {
        metadata: { error: true },
      });
    } finally {
      timer();
    }
  }

  private async reasonAndAct(input: Msg | undefined, context: Msg | undefined, signal: AbortSignal): Promise<Msg> {
    for (let iteration = 1; iteration <= this.maxIters; iteration++) {
      this.state.iteration = iteration;
      this.setPhase('reasoning');
      this.logger.debug(`Iteration ${iteration}`, { agent: this.name, maxIters: this.maxIters });

      const response = await this.callModel(await this.buildHistory(context), signal);
      const outcome = this.interpret(response);
      await this.print(outcome.message);
      throwIfAborted(signal);

      if (outcome.kind === 'finish') {
        await this.memory.addMessage(outcome.message);
        throwIfAborted(signal);
        await this.recordToLongTermMemory(input, outcome.message);
        throwIfAborted(signal);
        this.terminate('finished', 'completed');
        this.logger.info('Agent completed reply', { agent: this.name, iterations: iteration });
        return outcome.message;
      }

      await this.memory.addMessage(outcome.message);
      if (outcome.kind === 'continue') {
        continue;
      }

      this.setPhase('acting');
      const outcomes = await this.act(outcome.message, outcome.calls, signal);
      await this.memory.addMessage(new Msg(this.name, outcomes.map(toToolResultBlock), 'assistant'));
    }

    this.logger.warn('Hit maximum iterations', { agent: this.name, maxIters: this.maxIters });
    this.terminate('finished', 'max_iterations');
    const exhausted = new Msg(this.name, MAX_ITERATIONS_TEXT, 'assistant', {
      metadata: { terminationReason: 'max_iterations' },
    });
    await this.print(exhausted);
    throwIfAborted(signal);
    return exhausted;
  }

  /**
   * Dispatch a turn's tool calls. When interrupted, the stored call message is
   * withdrawn so memory never holds a tool_use without its tool_result.
   */
  private async act(callMessage: Msg, calls: ToolUseBlock[], signal: AbortSignal): Promise<ToolCallOutcome[]> {
    try {
      throwIfAborted(signal);
      const outcomes = await this.toolkit.executeToolCalls(calls, { parallel: this.parallelToolCalls, signal });
      throwIfAborted(signal);
      return outcomes;
    } catch (error) {
      if (error instanceof InterruptedError) {
        await this.memory.removeMessage(callMessage.id);
      }
      throw error;
    }
  }

  // ==========================================================================
  // Reasoning
  // ==========================================================================

  private async buildHistory(context: Msg | undefined): Promise<Msg[]> {
    const history: Msg[] = [];
    if (this.sysPrompt) {
      history.push(new Msg('system', this.sysPrompt, 'system'));
    }
    if (context) {
      history.push(context);
    }
    history.push(...(await this.memory.getMessages()));
    return history;
  }

  private async callModel(history: Msg[], signal: AbortSignal): Promise<ChatResponse> {
    throwIfAborted(signal);
    const tools = this.toolkit.getToolSchemas();
    const timer = this.logger.startTimer('model:call');

    try {
      const response =
        this.modelTimeoutMs === undefined
          ? await raceAbort(this.model.call(history, tools, this.toolChoice, { signal }), signal)
          : await withTimeout(
              'Model call',
              this.modelTimeoutMs,
              childSignal => this.model.call(history, tools, this.toolChoice, { signal: childSignal }),
              signal
            );

      this.logger.debug('Model response received', {
        blocks: response.content.length,
        toolCalls: response.getToolUseBlocks().length,
        inputTokens: response.usage?.inputTokens,
        outputTokens: response.usage?.outputTokens,
      });
      return response;
    } finally {
      timer();
    }
  }

  /**
   * Classify a model response. A finish call wins over every other call in the
   * same response, which then goes unexecuted.
   */
  private interpret(response: ChatResponse): ReasoningOutcome {
    const message = new Msg(this.name, response.content, 'assistant', { invocationId: response.id });
    const calls = response.getToolUseBlocks();
    const finishCall = calls.find(call => call.name === FINISH_TOOL_NAME);

    if (finishCall) {
      const answer = extractFinishResponse(finishCall.input) ?? message.getTextContent() ?? '';
      if (calls.length > 1) {
        this.logger.debug('Finish call present, skipping other tool calls', {
          skipped: calls.filter(call => call !== finishCall).map(call => call.name),
        });
      }
      return {
        kind: 'finish',
        message: new Msg(this.name, [textBlock(answer)], 'assistant', { invocationId: response.id }),
      };
    }

    if (calls.length > 0) {
      return { kind: 'act', message, calls };
    }

    const text = message.getTextContent();
    return text !== null && text.length > 0 ? { kind: 'finish', message } : { kind: 'continue', message };
  }

  // ==========================================================================
  // Long-Term Memory
  // ==========================================================================

  private async retrieveLongTermContext(input: Msg | undefined): Promise<Msg | undefined> {
    const query = input?.getTextContent();
    if (!this.longTermMemory || !this.staticControl || !query) {
      return undefined;
    }

    const entries = await this.longTermMemory.search(query);
    this.logger.debug('Retrieved long-term memory', { agent: this.name, count: entries.length });
    if (entries.length === 0) {
      return undefined;
    }

    const lines = entries.map(entry => `- ${entry.value}`).join('\n');
    return new Msg('system', `Relevant long-term memory:\n${lines}`, 'system');
  }

  private async recordToLongTermMemory(input: Msg | undefined, output: Msg): Promise<void> {
    const text = output.getTextContent();
    if (!this.longTermMemory || !this.staticControl || !text) {
      return;
    }

    const key = generateMemoryKey();
    await this.longTermMemory.store(key, text, {
      source: 'reply',
      agent: this.name,
      query: input?.getTextContent() ?? undefined,
    });
    this.logger.debug('Recorded reply to long-term memory', { agent: this.name, key });
  }

  // ==========================================================================
  // State
  // ==========================================================================

  private setPhase(phase: AgentPhase): void {
    this.state.phase = phase;
  }

  private terminate(phase: AgentPhase, reason: TerminationReason): void {
    this.state.phase = phase;
    this.state.running = false;
    this.state.terminationReason = reason;
  }
}

/**
 * Create a new ReAct agent.
 */
export function createReActAgent(options: ReActAgentOptions): ReActAgent {
  return new ReActAgent(options);
}
