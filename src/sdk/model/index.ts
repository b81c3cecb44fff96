export { ChatModelBase, validateToolChoice } from './chat-model.js';
export type { ChatModel } from './chat-model.js';
export { ChatResponse, ChatUsage } from './chat-response.js';
export type { ChatResponseDict, ChatResponseOptions, ChatUsageDict } from './chat-response.js';
