/**
 * Tessera SDK - Tool Definitions
 *
 * Tools are declared explicitly: a name, a description, the JSON schema shown
 * to the model and a function. An optional zod schema validates and types the
 * input before the function sees it.
 */

import type { z } from 'zod';
import { ToolResponse } from './tool-response.js';
import type { JsonSchemaObject, Logger } from './types.js';

/**
 * ToolContext - What a running tool gets besides its input.
 */
export interface ToolContext {
  /** Fires on timeout or when the owning reply is interrupted */
  signal: AbortSignal;
  toolName: string;
  /** The tool_use id, when the call came from a model response */
  callId?: string;
  logger: Logger;
}

export type ToolFunction<TInput = Record<string, unknown>> = (
  input: TInput,
  context: ToolContext
) => ToolResponse | Promise<ToolResponse>;

/**
 * ToolDefinition - A registered tool as the toolkit stores it.
 */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonSchemaObject;
  invoke(input: Record<string, unknown>, context: ToolContext): Promise<ToolResponse>;
}

interface ToolSpecBase {
  name: string;
  description: string;
  /** Defaults to an object schema with no properties */
  parameters?: JsonSchemaObject;
}

export interface TypedToolSpec<S extends z.ZodTypeAny> extends ToolSpecBase {
  input: S;
  execute: ToolFunction<z.output<S>>;
}

export interface UntypedToolSpec extends ToolSpecBase {
  execute: ToolFunction;
}

export const EMPTY_PARAMETERS: JsonSchemaObject = { type: 'object', properties: {} };

/**
 * Declare a tool.
 *
 * @example
 * ```typescript
 * const add = defineTool({
 *   name: 'add',
 *   description: 'Add two numbers',
 *   parameters: {
 *     type: 'object',
 *     properties: { a: { type: 'number' }, b: { type: 'number' } },
 *     required: ['a', 'b'],
 *   },
 *   input: z.object({ a: z.number(), b: z.number() }),
 *   execute: ({ a, b }) => ToolResponse.success(String(a + b)),
 * });
 * ```
 */
export function defineTool<S extends z.ZodTypeAny>(spec: TypedToolSpec<S>): ToolDefinition;
export function defineTool(spec: UntypedToolSpec): ToolDefinition;
export function defineTool(spec: TypedToolSpec<z.ZodTypeAny> | UntypedToolSpec): ToolDefinition {
  const parameters = spec.parameters ?? EMPTY_PARAMETERS;

  if (!('input' in spec)) {
    const execute = spec.execute;
    return {
      name: spec.name,
      description: spec.description,
      parameters,
      invoke: async (input, context) => execute(input, context),
    };
  }

  const { input: schema, execute } = spec;
  return {
    name: spec.name,
    description: spec.description,
    parameters,
    invoke: async (input, context) => {
      const parsed = schema.safeParse(input);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
          .join('; ');
        return ToolResponse.error(`Invalid input for tool "${spec.name}": ${issues}`, 'INVALID_TOOL_INPUT');
      }
      return execute(parsed.data, context);
    },
  };
}
