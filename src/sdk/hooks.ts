/**
 * Tessera SDK - Hook Pipeline
 *
 * Named callbacks bound to six lifecycle phases. Pre hooks may return a patch
 * that is merged into the phase arguments; post hooks see the outcome and may
 * return a replacement for it. Registration order is execution order.
 */

import { ValidationError } from './errors.js';
import type { Msg } from './message/msg.js';

export const HOOK_TYPES = [
  'pre_reply',
  'post_reply',
  'pre_print',
  'post_print',
  'pre_observe',
  'post_observe',
] as const;

export type HookType = (typeof HOOK_TYPES)[number];

export type PreHookType = Extract<HookType, `pre_${string}`>;
export type PostHookType = Extract<HookType, `post_${string}`>;

export function isHookType(value: unknown): value is HookType {
  return typeof value === 'string' && HOOK_TYPES.some(type => type === value);
}

// ============================================================================
// Phase Arguments
// ============================================================================

export interface ReplyKwargs {
  /** The input of the reply; undefined when replying to memory as it stands */
  msg: Msg | undefined;
}

export interface PrintKwargs {
  msg: Msg;
  /** True on the final chunk of a streamed message */
  last: boolean;
}

export interface ObserveKwargs {
  msg: Msg | Msg[] | undefined;
}

/**
 * Arguments each hook receives, by hook type.
 */
export interface HookKwargs {
  pre_reply: ReplyKwargs;
  post_reply: ReplyKwargs;
  pre_print: PrintKwargs;
  post_print: PrintKwargs;
  pre_observe: ObserveKwargs;
  post_observe: ObserveKwargs;
}

/**
 * What each hook may return, by hook type: a patch of the arguments for pre
 * hooks, a replacement output for post hooks. Post hooks of phases without an
 * output only observe.
 */
export interface HookResults {
  pre_reply: Partial<ReplyKwargs>;
  post_reply: Msg;
  pre_print: Partial<PrintKwargs>;
  post_print: undefined;
  pre_observe: Partial<ObserveKwargs>;
  post_observe: undefined;
}

/**
 * A hook. `output` is passed to post hooks only.
 */
export type HookFunction<TAgent, T extends HookType> = (
  agent: TAgent,
  kwargs: HookKwargs[T],
  output?: HookResults[T]
) => HookResults[T] | void | Promise<HookResults[T] | void>;

type HookStore<TAgent> = { [T in HookType]: Map<string, HookFunction<TAgent, T>> };

function assertHookType(type: unknown): void {
  if (!isHookType(type)) {
    throw new ValidationError(`Unsupported hook type: ${String(type)}. Supported: ${HOOK_TYPES.join(', ')}`);
  }
}

/**
 * HookRegistry - Ordered name-to-hook maps, one per hook type.
 *
 * Readers get a snapshot array, so a hook that registers or removes hooks
 * while running does not affect the invocation in progress.
 */
export class HookRegistry<TAgent> {
  private readonly store: HookStore<TAgent> = {
    pre_reply: new Map(),
    post_reply: new Map(),
    pre_print: new Map(),
    post_print: new Map(),
    pre_observe: new Map(),
    post_observe: new Map(),
  };

  /**
   * Register `fn` under `name`. Re-using a name replaces the hook and keeps its position.
   *
   * @throws ValidationError for an unknown hook type
   */
  register<T extends HookType>(type: T, name: string, fn: HookFunction<TAgent, T>): void {
    assertHookType(type);
    this.store[type].set(name, fn);
  }

  remove(type: HookType, name: string): boolean {
    assertHookType(type);
    return this.store[type].delete(name);
  }

  has(type: HookType, name: string): boolean {
    return this.store[type].has(name);
  }

  names(type: HookType): string[] {
    return Array.from(this.store[type].keys());
  }

  hooks<T extends HookType>(type: T): Array<HookFunction<TAgent, T>> {
    return Array.from(this.store[type].values());
  }

  /**
   * Remove every hook of `type`, or of all types when omitted.
   */
  clear(type?: HookType): void {
    for (const key of type === undefined ? HOOK_TYPES : [type]) {
      this.store[key].clear();
    }
  }
}
