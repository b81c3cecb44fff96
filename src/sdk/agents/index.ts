/**
 * Tessera SDK - Agents
 */

export { AgentBase, INTERRUPTED_REPLY_TEXT, printableText } from './agent-base.js';
export type { AgentBaseOptions, AgentHook, HookScope } from './agent-base.js';
