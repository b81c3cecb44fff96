/**
 * Tessera SDK - Chat Model Contract
 *
 * The agent talks to a language model only through `ChatModel.call`. Wire
 * formats, retries and authentication belong to implementations such as
 * the OpenAI-compatible model in core/llm.ts.
 */

import { ValidationError } from '../errors.js';
import type { Msg } from '../message/msg.js';
import { TOOL_CHOICE_MODES, type ModelCallOptions, type ToolChoice, type ToolSchema } from '../types.js';
import type { ChatResponse } from './chat-response.js';

/**
 * ChatModel - One request/response exchange with a model backend.
 *
 * Implementations reject with an error on transport or provider failure; the
 * agent turns that into an error message rather than retrying.
 */
export interface ChatModel {
  readonly modelName: string;

  call(
    messages: Msg[],
    tools?: ToolSchema[],
    toolChoice?: ToolChoice,
    options?: ModelCallOptions
  ): Promise<ChatResponse>;
}

function isToolChoiceMode(value: string): boolean {
  return TOOL_CHOICE_MODES.some(mode => mode === value);
}

/**
 * Reject a tool choice that is neither a generic mode nor the name of one of `tools`.
 */
export function validateToolChoice(toolChoice: ToolChoice | undefined, tools: readonly ToolSchema[] = []): void {
  if (toolChoice === undefined || isToolChoiceMode(toolChoice)) {
    return;
  }

  const available = tools.map(tool => tool.function.name);
  if (!available.includes(toolChoice)) {
    const options = [...TOOL_CHOICE_MODES, ...available].join(', ');
    throw new ValidationError(`Invalid tool_choice '${toolChoice}'. Available options: ${options}`);
  }
}

/**
 * ChatModelBase - Validates the call contract before delegating to `doCall`.
 */
export abstract class ChatModelBase implements ChatModel {
  readonly modelName: string;
  readonly stream: boolean;

  constructor(modelName: string, stream = false) {
    this.modelName = modelName;
    this.stream = stream;
  }

  async call(
    messages: Msg[],
    tools: ToolSchema[] = [],
    toolChoice?: ToolChoice,
    options: ModelCallOptions = {}
  ): Promise<ChatResponse> {
    validateToolChoice(toolChoice, tools);
    return this.doCall(messages, tools, toolChoice, options);
  }

  protected abstract doCall(
    messages: Msg[],
    tools: ToolSchema[],
    toolChoice: ToolChoice | undefined,
    options: ModelCallOptions
  ): Promise<ChatResponse>;

  toString(): string {
    return `${this.constructor.name}{modelName='${this.modelName}', stream=${this.stream}}`;
  }
}
