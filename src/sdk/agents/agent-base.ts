/**
 * Tessera SDK - Agent Base
 *
 * Lifecycle shared by every agent: hook-wrapped reply, observe and print
 * phases, one cancellable reply at a time, and subscribers that observe
 * each reply's output.
 */

import { randomUUID } from 'node:crypto';
import { Mutex } from 'async-mutex';
import { defaultLogger } from '../../core/logger.js';
import { errorMessage, InterruptedError } from '../errors.js';
import {
  HookRegistry,
  type HookFunction,
  type HookKwargs,
  type HookResults,
  type HookType,
  type PostHookType,
  type PreHookType,
} from '../hooks.js';
import { Msg } from '../message/msg.js';
import type { Logger } from '../types.js';

export type HookScope = 'global' | 'instance';

export type AgentHook<T extends HookType> = HookFunction<AgentBase, T>;

export interface AgentBaseOptions {
  name: string;
  logger?: Logger;

  /** Suppress everything `print` would write */
  disableConsoleOutput?: boolean;

  /** Sink for printed text (default: process.stdout) */
  output?: (text: string) => void;
}

export const INTERRUPTED_REPLY_TEXT = 'Agent interrupted and ready for new input.';

interface ActiveReply {
  controller: AbortController;
  done: Promise<Msg>;
}

/**
 * Text shown for a message: its text blocks, and thinking blocks marked as such.
 */
export function printableText(msg: Msg): string {
  if (typeof msg.content === 'string') {
    return msg.content;
  }
  const parts: string[] = [];
  for (const block of msg.content) {
    if (block.type === 'text') {
      parts.push(block.text);
    } else if (block.type === 'thinking') {
      parts.push(`(thinking) ${block.thinking}`);
    }
  }
  return parts.join('\n');
}

/**
 * AgentBase - Hooks, printing, interruption and subscriber fan-out.
 *
 * Subclasses implement `doReply` and `doObserve`. Hooks registered globally
 * apply to every agent of the same `kind` and run before instance hooks.
 */
export abstract class AgentBase {
  private static readonly globalHooks: Map<string, HookRegistry<AgentBase>> = new Map();

  readonly id: string = randomUUID();
  readonly name: string;

  /** Key under which global hooks for this agent type are registered */
  abstract readonly kind: string;

  protected readonly logger: Logger;
  protected disableConsoleOutput: boolean;

  private readonly instanceHooks = new HookRegistry<AgentBase>();
  private readonly subscribers: Map<string, AgentBase> = new Map();
  private readonly printedPrefixes: Map<string, string> = new Map();
  private readonly output: (text: string) => void;
  private active: ActiveReply | undefined;
  /** Held while a reply supersedes its predecessor and starts */
  private readonly replyGate = new Mutex();
  private pendingInterrupt: Promise<void> = Promise.resolve();

  constructor(options: AgentBaseOptions) {
    this.name = options.name;
    this.logger = options.logger ?? defaultLogger();
    this.disableConsoleOutput = options.disableConsoleOutput ?? false;
    this.output = options.output ?? ((text: string): void => {
      process.stdout.write(text);
    });
  }

  // ==========================================================================
  // Hook Registration
  // ==========================================================================

  static registerGlobalHook<T extends HookType>(kind: string, type: T, name: string, fn: AgentHook<T>): void {
    let registry = AgentBase.globalHooks.get(kind);
    if (!registry) {
      registry = new HookRegistry<AgentBase>();
      AgentBase.globalHooks.set(kind, registry);
    }
    registry.register(type, name, fn);
  }

  static removeGlobalHook(kind: string, type: HookType, name: string): boolean {
    return AgentBase.globalHooks.get(kind)?.remove(type, name) ?? false;
  }

  /**
   * Drop global hooks of one agent kind, or of every kind when omitted.
   */
  static clearGlobalHooks(kind?: string): void {
    if (kind === undefined) {
      AgentBase.globalHooks.clear();
    } else {
      AgentBase.globalHooks.delete(kind);
    }
  }

  registerInstanceHook<T extends HookType>(type: T, name: string, fn: AgentHook<T>): void {
    this.instanceHooks.register(type, name, fn);
  }

  removeInstanceHook(type: HookType, name: string): boolean {
    return this.instanceHooks.remove(type, name);
  }

  clearInstanceHooks(type?: HookType): void {
    this.instanceHooks.clear(type);
  }

  /**
   * Register a hook on this agent (`instance`) or on every agent of its kind (`global`).
   */
  registerHook<T extends HookType>(scope: HookScope, type: T, name: string, fn: AgentHook<T>): void {
    if (scope === 'global') {
      AgentBase.registerGlobalHook(this.kind, type, name, fn);
    } else {
      this.registerInstanceHook(type, name, fn);
    }
  }

  removeHook(scope: HookScope, type: HookType, name: string): boolean {
    return scope === 'global'
      ? AgentBase.removeGlobalHook(this.kind, type, name)
      : this.removeInstanceHook(type, name);
  }

  private hooksFor<T extends HookType>(type: T): Array<AgentHook<T>> {
    const global = AgentBase.globalHooks.get(this.kind)?.hooks(type) ?? [];
    return [...global, ...this.instanceHooks.hooks(type)];
  }

  // ==========================================================================
  // Hook Invocation
  // ==========================================================================

  /**
   * Run pre hooks in order, merging each returned patch into the arguments.
   */
  protected async runPreHooks<T extends PreHookType>(type: T, kwargs: HookKwargs[T]): Promise<HookKwargs[T]> {
    let current = kwargs;
    for (const hook of this.hooksFor(type)) {
      try {
        const patch = await hook(this, current);
        if (patch) {
          current = { ...current, ...patch };
        }
      } catch (error) {
        this.logHookFailure(type, error);
      }
    }
    return current;
  }

  /**
   * Run post hooks in order. A hook returning a value replaces the output
   * seen by the hooks after it and by the caller.
   */
  protected async runPostHooks<T extends PostHookType>(
    type: T,
    kwargs: HookKwargs[T],
    output: HookResults[T]
  ): Promise<HookResults[T]> {
    let current = output;
    for (const hook of this.hooksFor(type)) {
      try {
        const replaced = await hook(this, kwargs, current);
        if (replaced) {
          current = replaced;
        }
      } catch (error) {
        this.logHookFailure(type, error);
      }
    }
    return current;
  }

  private logHookFailure(type: HookType, error: unknown): void {
    this.logger.warn(`Hook failed during ${type}, skipping`, {
      agent: this.name,
      error: errorMessage(error),
    });
  }

  // ==========================================================================
  // Reply
  // ==========================================================================

  /**
   * Produce a reply to `input`, or to memory as it stands when omitted.
   *
   * A reply already in flight is interrupted and allowed to settle first.
   * Concurrent callers supersede one another in arrival order.
   */
  async reply(input?: string | Msg): Promise<Msg> {
    const msg = typeof input === 'string' ? new Msg('user', input, 'user') : input;
    const active = await this.replyGate.runExclusive(async () => {
      const previous = this.active;
      if (previous) {
        this.logger.info('Superseding in-flight reply', { agent: this.name });
        await this.interrupt();
        await Promise.allSettled([previous.done]);
      }

      const controller = new AbortController();
      const started: ActiveReply = { controller, done: this.runReply(msg, controller.signal) };
      this.active = started;
      return started;
    });

    try {
      return await active.done;
    } finally {
      if (this.active === active) {
        this.active = undefined;
      }
    }
  }

  /**
   * Is a reply in flight?
   */
  isReplying(): boolean {
    return this.active !== undefined;
  }

  private async runReply(input: Msg | undefined, signal: AbortSignal): Promise<Msg> {
    const kwargs = await this.runPreHooks('pre_reply', { msg: input });

    let output: Msg;
    try {
      output = await this.doReply(kwargs.msg, signal);
    } catch (error) {
      if (!(error instanceof InterruptedError && signal.aborted)) {
        throw error;
      }
      await this.pendingInterrupt;
      output = await this.handleInterrupt(kwargs.msg);
    }

    output = await this.runPostHooks('post_reply', kwargs, output);
    await this.broadcast(output);
    return output;
  }

  /**
   * Reply body. Must reject with InterruptedError once `signal` fires.
   */
  protected abstract doReply(msg: Msg | undefined, signal: AbortSignal): Promise<Msg>;

  /**
   * The message an interrupted reply resolves with.
   */
  protected async handleInterrupt(_input: Msg | undefined): Promise<Msg> {
    return new Msg(this.name, INTERRUPTED_REPLY_TEXT, 'assistant', { metadata: { interrupted: true } });
  }

  /**
   * Observe `msg` (when given) and cancel the in-flight reply, which then
   * resolves with the interrupted message.
   */
  async interrupt(msg?: Msg): Promise<void> {
    const observed = msg ? this.observe(msg) : Promise.resolve();
    this.pendingInterrupt = observed;

    if (this.active && !this.active.controller.signal.aborted) {
      this.logger.info('Interrupting reply', { agent: this.name });
      this.active.controller.abort(new InterruptedError());
    }
    await observed;
  }

  // ==========================================================================
  // Observe
  // ==========================================================================

  /**
   * Take `msg` into the agent's context without replying.
   */
  async observe(msg: Msg | Msg[] | undefined): Promise<void> {
    const kwargs = await this.runPreHooks('pre_observe', { msg });
    await this.doObserve(kwargs.msg);
    await this.runPostHooks('post_observe', kwargs, undefined);
  }

  protected abstract doObserve(msg: Msg | Msg[] | undefined): Promise<void>;

  // ==========================================================================
  // Print
  // ==========================================================================

  /**
   * Print `msg`. Repeated calls with the same message id and growing content
   * print only the new part; `last` ends the line and forgets the message.
   */
  async print(msg: Msg, last = true): Promise<void> {
    const kwargs = await this.runPreHooks('pre_print', { msg, last });

    if (!this.disableConsoleOutput) {
      this.writeDelta(kwargs.msg, kwargs.last);
    }

    await this.runPostHooks('post_print', kwargs, undefined);
  }

  private writeDelta(msg: Msg, last: boolean): void {
    const text = printableText(msg);
    const printed = this.printedPrefixes.get(msg.id);

    let chunk: string;
    if (printed === undefined) {
      chunk = text.length > 0 || last ? `${msg.name}: ${text}` : '';
    } else if (text.startsWith(printed)) {
      chunk = text.slice(printed.length);
    } else {
      chunk = text;
    }

    if (last) {
      this.printedPrefixes.delete(msg.id);
      if (printed === undefined && text.length === 0) {
        return;
      }
      this.output(`${chunk}\n`);
      return;
    }

    if (chunk.length > 0) {
      this.output(chunk);
      this.printedPrefixes.set(msg.id, text);
    }
  }

  setConsoleOutputEnabled(enabled: boolean): void {
    this.disableConsoleOutput = !enabled;
  }

  // ==========================================================================
  // Subscribers
  // ==========================================================================

  /**
   * Have `agents` observe every message this agent replies with.
   */
  addSubscribers(agents: readonly AgentBase[]): void {
    for (const agent of agents) {
      if (agent.id !== this.id) {
        this.subscribers.set(agent.id, agent);
      }
    }
  }

  removeSubscribers(agents: readonly AgentBase[]): void {
    for (const agent of agents) {
      this.subscribers.delete(agent.id);
    }
  }

  getSubscribers(): AgentBase[] {
    return Array.from(this.subscribers.values());
  }

  private async broadcast(msg: Msg): Promise<void> {
    for (const subscriber of this.subscribers.values()) {
      await subscriber.observe(msg);
    }
  }

  toString(): string {
    return `${this.kind}(name=${this.name})`;
  }
}
