import type { Msg } from '../message/msg.js';

/** Per-message overhead added to the text estimate. */
const MESSAGE_OVERHEAD_TOKENS = 10;

/**
 * Rough token estimate: a quarter of the text length plus a fixed overhead per message.
 */
export function estimateTokenCount(messages: readonly Msg[]): number {
  return messages.reduce((total, msg) => {
    const text = msg.getTextContent();
    return total + (text === null ? 0 : Math.floor(text.length / 4)) + MESSAGE_OVERHEAD_TOKENS;
  }, 0);
}
