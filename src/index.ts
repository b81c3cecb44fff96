/**
 * tessera-agent
 *
 * Reasoning-acting agent core with an OpenAI-compatible model backend.
 *
 * @example
 * ```typescript
 * import { createChatModel, createReActAgent } from 'tessera-agent';
 *
 * const agent = createReActAgent({
 *   name: 'Assistant',
 *   model: createChatModel({ model: 'gpt-4o' }),
 * });
 * const answer = await agent.reply('What time is it?');
 * ```
 */

export const VERSION = '0.1.0';
export const PACKAGE_NAME = 'tessera-agent';

export * from './sdk/index.js';
export * from './core/index.js';
