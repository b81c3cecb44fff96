#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, loadEnvFile, type ConfigOverrides } from './core/config.js';
import { createChatModel } from './core/llm.js';
import { createLogger } from './core/logger.js';
import { errorMessage } from './sdk/errors.js';
import { InMemoryMemory } from './sdk/memory/in-memory.js';
import { InMemoryLongTermMemory } from './sdk/memory/long-term.js';
import { createReActAgent } from './sdk/orchestrator.js';
import { createToolkit } from './sdk/registry.js';

loadEnvFile();
const program = new Command();

interface CliOptions {
  model?: string;
  baseUrl?: string;
  apiKey?: string;
  maxIters?: number;
  parallel?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

async function runTask(task: string, options: CliOptions): Promise<void> {
  const overrides: ConfigOverrides = {
    model: { name: options.model, baseUrl: options.baseUrl, apiKey: options.apiKey },
    agent: { maxIters: options.maxIters, parallelToolCalls: options.parallel },
    logging: { level: options.verbose ? 'debug' : options.quiet ? 'silent' : undefined },
  };
  const config = loadConfig(process.env, overrides);

  const logger = createLogger({ level: config.logging.level });
  logger.info('Initializing agent...', {
    provider: config.model.provider,
    model: config.model.name,
    maxIters: config.agent.maxIters,
  });

  const model = createChatModel({
    model: config.model.name,
    apiKey: config.model.apiKey,
    baseUrl: config.model.baseUrl,
    maxTokens: config.model.maxTokens,
    temperature: config.model.temperature,
    timeoutMs: config.model.timeoutMs,
    logger: logger.child('model'),
  });

  const toolkit = createToolkit({
    logger: logger.child('tools'),
    executionTimeoutMs: config.tools.executionTimeoutMs,
    enableAsync: config.tools.enableAsync,
  });

  const agent = createReActAgent({
    name: config.agent.name,
    sysPrompt: config.agent.sysPrompt,
    model,
    toolkit,
    memory: new InMemoryMemory({
      maxMessages: config.memory.maxMessages,
      autoTruncate: config.memory.autoTruncate,
      logger: logger.child('memory'),
    }),
    longTermMemory: new InMemoryLongTermMemory(),
    longTermMemoryMode: config.agent.longTermMemoryMode,
    parallelToolCalls: config.agent.parallelToolCalls,
    maxIters: config.agent.maxIters,
    modelTimeoutMs: config.agent.modelTimeoutMs,
    toolChoice: config.agent.toolChoice,
    logger,
  });

  const onSigint = (): void => {
    logger.warn('Interrupt received');
    agent.interrupt().catch((error: unknown) => {
      logger.error('Failed to interrupt agent', { error: errorMessage(error) });
    });
  };
  process.once('SIGINT', onSigint);

  try {
    const result = await agent.reply(task);
    const state = agent.getState();
    if (state.terminationReason === 'completed') {
      logger.info('Task completed successfully', { iterations: state.iteration });
    } else {
      logger.info(`Task ended: ${state.terminationReason ?? 'unknown'}`);
    }
    if (result.metadata?.error === true) {
      process.exitCode = 1;
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

program
  .name('tessera')
  .description('Run a reasoning-acting agent on a task')
  .version('0.1.0')
  .argument('<task>', 'The task to execute')
  .option('-m, --model <name>', 'Model name (or set TESSERA_MODEL)')
  .option('-u, --base-url <url>', 'Base URL of an OpenAI-compatible API (or set TESSERA_BASE_URL)')
  .option('-k, --api-key <key>', 'API key (or set OPENAI_API_KEY)')
  .option('-n, --max-iters <count>', 'Maximum reasoning iterations', parsePositiveInt)
  .option('-p, --parallel', 'Execute tool calls in parallel')
  .option('-v, --verbose', 'Enable debug logs')
  .option('-q, --quiet', 'Disable logs')
  .action(async (task: string, options: CliOptions) => {
    try {
      await runTask(task, options);
    } catch (error) {
      console.error(errorMessage(error));
      process.exitCode = 1;
    }
  });

await program.parseAsync();
