/**
 * Tessera - Core Module Index
 *
 * Core infrastructure: chat model backend, logging, configuration.
 */

export { OpenAIChatModel, createChatModel, DEFAULT_BASE_URL, DEFAULT_MODEL_TIMEOUT_MS } from './llm.js';
export type { OpenAIChatModelConfig } from './llm.js';

export { ConsoleLogger, createLogger, defaultLogger, formatLogEntry, LOG_LEVEL_NAMES } from './logger.js';
export type { EmittingLevel, LogEntry, LoggerOptions, LoggerSettings, LogLevel, LogSink } from './logger.js';

export { DEFAULT_SYSTEM_PROMPT, ENV_VARS, loadConfig, loadEnvFile } from './config.js';
export type { ConfigOverrides, TesseraConfig } from './config.js';
