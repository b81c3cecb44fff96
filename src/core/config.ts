/**
 * Tessera - Configuration
 *
 * Environment-driven settings, validated with zod. Every field maps to one
 * environment variable; explicit overrides (CLI flags) win over the environment.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../sdk/errors.js';
import { LONG_TERM_MEMORY_MODES } from '../sdk/types.js';
import { LOG_LEVEL_NAMES } from './logger.js';

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful assistant that solves tasks step by step.

Call the available tools when they help. Tool results are returned to you before your next step.

When the task is complete, call generate_response with your final answer.
Do NOT keep repeating actions after they succeed.`;

// ============================================================================
// Schema
// ============================================================================

const envBoolean = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0', 'yes', 'no']).transform(value => value === 'true' || value === '1' || value === 'yes'),
]);

const positiveInt = z.coerce.number().int().positive();

const configSchema = z.object({
  model: z
    .object({
      provider: z.enum(['openai', 'openai-compatible']).default('openai'),
      name: z.string().min(1).default('gpt-4o'),
      baseUrl: z.string().url().optional(),
      apiKey: z.string().min(1).optional(),
      timeoutMs: positiveInt.default(120_000),
      maxTokens: positiveInt.optional(),
      temperature: z.coerce.number().min(0).max(2).optional(),
    })
    .superRefine((model, ctx) => {
      if (model.provider === 'openai-compatible' && model.baseUrl === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['baseUrl'],
          message: 'Required for the openai-compatible provider',
        });
      }
    })
    .default({}),
  agent: z
    .object({
      name: z.string().min(1).default('Assistant'),
      sysPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
      maxIters: positiveInt.default(10),
      parallelToolCalls: envBoolean.default(false),
      modelTimeoutMs: positiveInt.optional(),
      toolChoice: z.string().min(1).optional(),
      longTermMemoryMode: z.enum(LONG_TERM_MEMORY_MODES).default('both'),
    })
    .default({}),
  memory: z
    .object({
      maxMessages: positiveInt.default(1000),
      autoTruncate: envBoolean.default(true),
    })
    .default({}),
  tools: z
    .object({
      executionTimeoutMs: positiveInt.default(30_000),
      enableAsync: envBoolean.default(true),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_NAMES).default('info'),
    })
    .default({}),
});

export type TesseraConfig = z.infer<typeof configSchema>;

type ConfigInput = z.input<typeof configSchema>;

type ConfigSection = keyof TesseraConfig;

/**
 * Values that take precedence over the environment; undefined entries are ignored.
 */
export type ConfigOverrides = { [S in ConfigSection]?: Partial<NonNullable<ConfigInput[S]>> };

// ============================================================================
// Environment Mapping
// ============================================================================

export const ENV_VARS: Record<ConfigSection, Record<string, string>> = {
  model: {
    provider: 'TESSERA_MODEL_PROVIDER',
    name: 'TESSERA_MODEL',
    baseUrl: 'TESSERA_BASE_URL',
    apiKey: 'OPENAI_API_KEY',
    timeoutMs: 'TESSERA_REQUEST_TIMEOUT_MS',
    maxTokens: 'TESSERA_MAX_TOKENS',
    temperature: 'TESSERA_TEMPERATURE',
  },
  agent: {
    name: 'TESSERA_AGENT_NAME',
    sysPrompt: 'TESSERA_SYS_PROMPT',
    maxIters: 'TESSERA_MAX_ITERS',
    parallelToolCalls: 'TESSERA_PARALLEL_TOOL_CALLS',
    modelTimeoutMs: 'TESSERA_MODEL_CALL_TIMEOUT_MS',
    toolChoice: 'TESSERA_TOOL_CHOICE',
    longTermMemoryMode: 'TESSERA_LONG_TERM_MEMORY_MODE',
  },
  memory: {
    maxMessages: 'TESSERA_MEMORY_MAX_MESSAGES',
    autoTruncate: 'TESSERA_MEMORY_AUTO_TRUNCATE',
  },
  tools: {
    executionTimeoutMs: 'TESSERA_TOOL_TIMEOUT_MS',
    enableAsync: 'TESSERA_TOOL_ASYNC',
  },
  logging: {
    level: 'TESSERA_LOG_LEVEL',
  },
};

const SECTIONS: readonly ConfigSection[] = ['model', 'agent', 'memory', 'tools', 'logging'];

function readSection(env: NodeJS.ProcessEnv, vars: Record<string, string>): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [field, name] of Object.entries(vars)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== '') {
      values[field] = value.trim();
    }
  }
  return values;
}

function compact(values: Record<string, unknown> | undefined): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values ?? {}).filter(([, value]) => value !== undefined));
}

function describeIssue(issue: z.ZodIssue): string {
  const [section, field] = issue.path;
  const key = SECTIONS.find(name => name === section);
  const envName = key !== undefined && typeof field === 'string' ? ENV_VARS[key][field] : undefined;
  const location = issue.path.join('.');
  return envName ? `${location} (${envName}): ${issue.message}` : `${location}: ${issue.message}`;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load a .env file into process.env. Variables already set are kept.
 */
export function loadEnvFile(path?: string): void {
  dotenv.config(path === undefined ? undefined : { path });
}

/**
 * Build the validated configuration from `env` and `overrides`.
 *
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): TesseraConfig {
  const raw: Record<string, Record<string, unknown>> = {};
  for (const section of SECTIONS) {
    raw[section] = { ...readSection(env, ENV_VARS[section]), ...compact(overrides[section]) };
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(describeIssue));
  }
  return parsed.data;
}
