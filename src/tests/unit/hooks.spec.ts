import { afterEach, describe, expect, it } from 'vitest';

import { AgentBase } from '../../sdk/agents/agent-base.js';
import { ValidationError } from '../../sdk/errors.js';
import { HookRegistry, isHookType } from '../../sdk/hooks.js';
import { Msg } from '../../sdk/message/msg.js';
import { ReActAgent, REACT_AGENT_KIND } from '../../sdk/orchestrator.js';
import { createToolkit } from '../../sdk/registry.js';
import { respondFinish, respondText, ScriptedModel, silentLogger } from '../helpers/scripted-model.js';

const createAgent = (model: ScriptedModel, output?: (text: string) => void) =>
  new ReActAgent({
    name: 'Agent',
    model,
    toolkit: createToolkit({ logger: silentLogger() }),
    logger: silentLogger(),
    disableConsoleOutput: output === undefined,
    output,
  });

afterEach(() => {
  AgentBase.clearGlobalHooks();
});

describe('HookRegistry', () => {
  it('keeps registration order and replaces in place', () => {
    const registry = new HookRegistry<string>();
    registry.register('pre_reply', 'first', () => undefined);
    registry.register('pre_reply', 'second', () => undefined);
    registry.register('pre_reply', 'first', () => ({ msg: undefined }));

    expect(registry.names('pre_reply')).toEqual(['first', 'second']);
    expect(registry.has('pre_reply', 'second')).toBe(true);
    expect(registry.remove('pre_reply', 'second')).toBe(true);
    expect(registry.remove('pre_reply', 'second')).toBe(false);
    expect(registry.names('post_reply')).toEqual([]);
  });

  it('rejects unknown hook types', () => {
    const registry = new HookRegistry<string>();

    expect(isHookType('mid_reply')).toBe(false);
    expect(() => Reflect.apply(registry.register, registry, ['mid_reply', 'x', () => undefined])).toThrow(
      ValidationError
    );
  });

  it('hands out snapshots', () => {
    const registry = new HookRegistry<string>();
    registry.register('post_print', 'a', () => undefined);

    const snapshot = registry.hooks('post_print');
    registry.register('post_print', 'b', () => undefined);

    expect(snapshot).toHaveLength(1);
    expect(registry.hooks('post_print')).toHaveLength(2);
  });
});

describe('agent hooks', () => {
  it('runs global hooks before instance hooks, each in registration order', async () => {
    const agent = createAgent(new ScriptedModel([respondText('ok')]));
    const order: string[] = [];
    agent.registerInstanceHook('pre_reply', 'instance-1', () => {
      order.push('instance-1');
    });
    AgentBase.registerGlobalHook(REACT_AGENT_KIND, 'pre_reply', 'global-1', () => {
      order.push('global-1');
    });
    agent.registerInstanceHook('pre_reply', 'instance-2', () => {
      order.push('instance-2');
    });
    agent.registerHook('global', 'pre_reply', 'global-2', () => {
      order.push('global-2');
    });

    await agent.reply('hi');

    expect(order).toEqual(['global-1', 'global-2', 'instance-1', 'instance-2']);
  });

  it('ignores global hooks registered for another agent kind', async () => {
    const agent = createAgent(new ScriptedModel([respondText('ok')]));
    let called = false;
    AgentBase.registerGlobalHook('OtherAgent', 'pre_reply', 'other', () => {
      called = true;
    });

    await agent.reply('hi');

    expect(called).toBe(false);
  });

  it('merges a pre_reply patch into the reply input', async () => {
    const model = new ScriptedModel([respondText('ok')]);
    const agent = createAgent(model);
    agent.registerInstanceHook('pre_reply', 'rewrite', () => ({ msg: new Msg('user', 'rewritten', 'user') }));

    await agent.reply('original');

    expect(model.calls[0].messages.map(msg => msg.getTextContent())).toEqual(['rewritten']);
  });

  it('lets post_reply hooks replace the output in turn', async () => {
    const agent = createAgent(new ScriptedModel([respondFinish('draft')]));
    const seen: Array<string | null> = [];
    agent.registerInstanceHook('post_reply', 'polish', (_agent, _kwargs, output) => {
      seen.push(output?.getTextContent() ?? null);
      return new Msg('Agent', 'polished', 'assistant');
    });
    agent.registerInstanceHook('post_reply', 'observe', (_agent, kwargs, output) => {
      seen.push(kwargs.msg?.getTextContent() ?? null, output?.getTextContent() ?? null);
    });

    const result = await agent.reply('write something');

    expect(result.getTextContent()).toBe('polished');
    expect(seen).toEqual(['draft', 'write something', 'polished']);
  });

  it('logs and skips a throwing hook', async () => {
    const agent = createAgent(new ScriptedModel([respondText('ok')]));
    const order: string[] = [];
    agent.registerInstanceHook('pre_reply', 'broken', () => {
      throw new Error('hook failure');
    });
    agent.registerInstanceHook('pre_reply', 'after', () => {
      order.push('after');
    });

    const result = await agent.reply('hi');

    expect(order).toEqual(['after']);
    expect(result.getTextContent()).toBe('ok');
  });

  it('does not run a hook registered while the phase is running', async () => {
    const agent = createAgent(new ScriptedModel([respondText('one'), respondText('two')]));
    const order: string[] = [];
    agent.registerInstanceHook('pre_reply', 'installer', () => {
      order.push('installer');
      agent.registerInstanceHook('pre_reply', 'late', () => {
        order.push('late');
      });
    });

    await agent.reply('first');
    expect(order).toEqual(['installer']);

    await agent.reply('second');
    expect(order).toEqual(['installer', 'installer', 'late']);
  });

  it('removes hooks by scope and name', async () => {
    const agent = createAgent(new ScriptedModel([respondText('ok')]));
    let calls = 0;
    agent.registerHook('global', 'pre_reply', 'count', () => {
      calls += 1;
    });
    agent.registerHook('instance', 'pre_reply', 'count', () => {
      calls += 1;
    });

    expect(agent.removeHook('global', 'pre_reply', 'count')).toBe(true);
    expect(agent.removeHook('instance', 'pre_reply', 'count')).toBe(true);
    await agent.reply('hi');

    expect(calls).toBe(0);
  });

  it('wraps observe with pre and post hooks', async () => {
    const agent = createAgent(new ScriptedModel([]));
    const observed: string[] = [];
    agent.registerInstanceHook('pre_observe', 'redact', () => ({ msg: new Msg('user', '[redacted]', 'user') }));
    agent.registerInstanceHook('post_observe', 'track', (_agent, kwargs) => {
      const msgs = kwargs.msg === undefined ? [] : Array.isArray(kwargs.msg) ? kwargs.msg : [kwargs.msg];
      observed.push(...msgs.map(msg => msg.getTextContent() ?? ''));
    });

    await agent.observe(new Msg('user', 'secret', 'user'));

    expect(observed).toEqual(['[redacted]']);
    expect((await agent.memory.getMessages()).map(msg => msg.getTextContent())).toEqual(['[redacted]']);
  });

  it('wraps print with pre and post hooks', async () => {
    const written: string[] = [];
    const agent = createAgent(new ScriptedModel([]), text => written.push(text));
    const lastFlags: boolean[] = [];
    agent.registerInstanceHook('pre_print', 'shout', (_agent, kwargs) => ({
      msg: new Msg(kwargs.msg.name, (kwargs.msg.getTextContent() ?? '').toUpperCase(), 'assistant'),
    }));
    agent.registerInstanceHook('post_print', 'track', (_agent, kwargs) => {
      lastFlags.push(kwargs.last);
    });

    await agent.print(new Msg('Agent', 'quiet words', 'assistant'));

    expect(written).toEqual(['Agent: QUIET WORDS\n']);
    expect(lastFlags).toEqual([true]);
  });
});
