import { describe, expect, it } from 'vitest';

import { ValidationError } from '../../sdk/errors.js';
import {
  parseContentBlock,
  textBlock,
  thinkingBlock,
  toolResultBlock,
  toolUseBlock,
} from '../../sdk/message/content-blocks.js';
import { Msg } from '../../sdk/message/msg.js';

describe('Msg', () => {
  it('assigns a unique id and an ISO timestamp', () => {
    const first = new Msg('user', 'hi', 'user');
    const second = new Msg('user', 'hi', 'user');

    expect(first.id).not.toBe(second.id);
    expect(Number.isNaN(Date.parse(first.timestamp))).toBe(false);
    expect(first.equals(second)).toBe(false);
  });

  it('rejects a role outside user, assistant and system', () => {
    const msg = new Msg('user', 'hi', 'user');

    expect(() => {
      msg.role = 'tool';
    }).toThrow(ValidationError);
    expect(msg.role).toBe('user');

    msg.role = 'system';
    expect(msg.role).toBe('system');
  });

  it('concatenates text blocks and ignores other kinds', () => {
    const msg = new Msg(
      'Agent',
      [thinkingBlock('plan'), textBlock('Hello, '), toolUseBlock('c1', 'echo'), textBlock('world')],
      'assistant'
    );

    expect(msg.getTextContent()).toBe('Hello, world');
  });

  it('returns null text for a message with no text blocks', () => {
    const msg = new Msg('Agent', [toolUseBlock('c1', 'echo', { message: 'x' })], 'assistant');

    expect(msg.getTextContent()).toBeNull();
  });

  it('filters content blocks by type', () => {
    const msg = new Msg('Agent', [textBlock('a'), toolUseBlock('c1', 'echo'), toolUseBlock('c2', 'get_current_time')], 'assistant');

    expect(msg.getContentBlocks('tool_use').map(block => block.id)).toEqual(['c1', 'c2']);
    expect(msg.getContentBlocks()).toHaveLength(3);
    expect(msg.hasContentBlocks('tool_result')).toBe(false);
    expect(new Msg('user', 'plain', 'user').getContentBlocks()).toEqual([]);
  });

  it('keeps id, content and metadata through toDict and fromDict', () => {
    const msg = new Msg('Agent', [textBlock('done'), toolResultBlock('c1', 'ok', 'echo')], 'assistant', {
      metadata: { score: 1 },
      invocationId: 'inv-1',
    });

    const restored = Msg.fromDict(msg.toDict());

    expect(restored.id).toBe(msg.id);
    expect(restored.name).toBe('Agent');
    expect(restored.role).toBe('assistant');
    expect(restored.content).toEqual([
      { type: 'text', text: 'done' },
      { type: 'tool_result', id: 'c1', name: 'echo', output: 'ok' },
    ]);
    expect(restored.metadata).toEqual({ score: 1 });
    expect(restored.invocationId).toBe('inv-1');
    expect(restored.timestamp).toBe(msg.timestamp);
  });

  it('rejects a dict with an unknown role', () => {
    expect(() => Msg.fromDict({ name: 'x', role: 'tool', content: 'hi' })).toThrow(ValidationError);
  });
});

describe('content blocks', () => {
  it('keeps an unknown block kind verbatim', () => {
    const raw = { type: 'citation', source: 'doc-1', span: [1, 4] };

    const block = parseContentBlock(raw);

    expect(block).toEqual({ type: 'opaque', raw });
    const msg = Msg.fromDict({ name: 'x', role: 'assistant', content: [raw] });
    expect(msg.toDict().content).toEqual([raw]);
  });

  it('throws on a known kind with the wrong shape', () => {
    expect(() => parseContentBlock({ type: 'text' })).toThrow();
  });
});
