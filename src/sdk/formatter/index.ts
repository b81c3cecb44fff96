export { FormatterBase, truncateMessages } from './formatter-base.js';
export type { FormatOptions, FormatterCapabilities } from './formatter-base.js';
export { OpenAIFormatter, openAIResponseSchema } from './openai-formatter.js';
export type {
  OpenAIContentPart,
  OpenAIFormatterOptions,
  OpenAIMessage,
  OpenAIRequestBody,
  OpenAIResponse,
  OpenAIToolCall,
  OpenAIToolChoice,
} from './openai-formatter.js';
