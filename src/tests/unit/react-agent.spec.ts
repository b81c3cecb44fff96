import { describe, expect, it } from 'vitest';

import { INTERRUPTED_REPLY_TEXT } from '../../sdk/agents/agent-base.js';
import { ValidationError } from '../../sdk/errors.js';
import { InMemoryLongTermMemory } from '../../sdk/memory/long-term.js';
import { textBlock, thinkingBlock, toolUseBlock } from '../../sdk/message/content-blocks.js';
import { Msg } from '../../sdk/message/msg.js';
import type { ChatResponse } from '../../sdk/model/chat-response.js';
import { LOOP_ERROR_PREFIX, MAX_ITERATIONS_TEXT, ReActAgent, type ReActAgentOptions } from '../../sdk/orchestrator.js';
import { createToolkit, type Toolkit } from '../../sdk/registry.js';
import { defineTool } from '../../sdk/tool.js';
import { ToolResponse } from '../../sdk/tool-response.js';
import { sleep } from '../../sdk/utils/async.js';
import { respond, respondFinish, respondText, ScriptedModel, silentLogger, untilAborted } from '../helpers/scripted-model.js';

const createAgent = (model: ScriptedModel, options: Partial<ReActAgentOptions> = {}) =>
  new ReActAgent({
    name: 'Agent',
    model,
    toolkit: createToolkit({ logger: silentLogger() }),
    logger: silentLogger(),
    disableConsoleOutput: true,
    ...options,
  });

const texts = async (agent: ReActAgent) => (await agent.memory.getMessages()).map(msg => msg.getTextContent());

/**
 * A model step that reports when it is reached and then waits for the reply to be cancelled.
 */
function blockingStep() {
  let markCalled: () => void = () => undefined;
  const called = new Promise<void>(resolve => {
    markCalled = resolve;
  });
  const step = (_messages: Msg[], signal: AbortSignal | undefined): Promise<ChatResponse> => {
    markCalled();
    return untilAborted(signal);
  };
  return { called, step };
}

describe('ReActAgent', () => {
  describe('reasoning loop', () => {
    it('finishes on the finish tool in one iteration', async () => {
      const model = new ScriptedModel([respondFinish('done')]);
      const agent = createAgent(model);

      const result = await agent.reply('do the thing');

      expect(result.getTextContent()).toBe('done');
      expect(result.role).toBe('assistant');
      expect(result.name).toBe('Agent');
      expect(model.calls).toHaveLength(1);
      expect(agent.getState()).toEqual({ phase: 'finished', iteration: 1, running: false, terminationReason: 'completed' });
      expect(await texts(agent)).toEqual(['do the thing', 'done']);
    });

    it('treats text without tool calls as the answer', async () => {
      const agent = createAgent(new ScriptedModel([respondText('All good')]));

      const result = await agent.reply('status?');

      expect(result.getTextContent()).toBe('All good');
      expect(await agent.memory.size()).toBe(2);
    });

    it('keeps going after an empty response', async () => {
      const model = new ScriptedModel([respond(), respondText('late answer')]);
      const agent = createAgent(model);

      const result = await agent.reply('hello');

      expect(result.getTextContent()).toBe('late answer');
      expect(model.calls).toHaveLength(2);
      expect(await agent.memory.size()).toBe(3);
    });

    it('answers a second turn on top of observed history', async () => {
      const model = new ScriptedModel([respondFinish('done')]);
      const agent = createAgent(model);
      await agent.observe([new Msg('user', 'earlier question', 'user'), new Msg('Agent', 'earlier answer', 'assistant')]);

      const result = await agent.reply('next');

      expect(model.calls).toHaveLength(1);
      expect(model.calls[0].messages.map(msg => msg.getTextContent())).toEqual(['earlier question', 'earlier answer', 'next']);
      expect(result.role).toBe('assistant');
      expect(result.getTextContent()).toBe('done');
      expect(agent.getState().iteration).toBe(1);
      expect(await texts(agent)).toEqual(['earlier question', 'earlier answer', 'next', 'done']);
    });

    it('prepends the system prompt without storing it', async () => {
      const model = new ScriptedModel([respondText('ok')]);
      const agent = createAgent(model, { sysPrompt: 'You are terse.' });

      await agent.reply('hi');

      const sent = model.calls[0].messages;
      expect(sent.map(msg => msg.role)).toEqual(['system', 'user']);
      expect(sent[0].getTextContent()).toBe('You are terse.');
      expect(await texts(agent)).toEqual(['hi', 'ok']);
    });

    it('feeds tool results back to the model', async () => {
      const model = new ScriptedModel([
        respond(toolUseBlock('call-1', 'echo', { message: 'ping' })),
        respondFinish('pong'),
      ]);
      const agent = createAgent(model);

      await agent.reply('echo ping');

      const second = model.calls[1].messages;
      expect(second).toHaveLength(3);
      expect(second[2].role).toBe('assistant');
      expect(second[2].content).toEqual([{ type: 'tool_result', id: 'call-1', name: 'echo', output: 'ping' }]);
    });

    it('stops at the iteration limit without storing the limit message', async () => {
      let n = 0;
      const model = new ScriptedModel([], () => {
        n += 1;
        return respond(toolUseBlock(`call-${n}`, 'echo', { message: 'again' }));
      });
      const agent = createAgent(model, { maxIters: 3 });

      const result = await agent.reply('loop forever');

      expect(result.getTextContent()).toBe(MAX_ITERATIONS_TEXT);
      expect(result.metadata).toEqual({ terminationReason: 'max_iterations' });
      expect(model.calls).toHaveLength(3);
      expect(await agent.memory.size()).toBe(7);
      expect(agent.getState().terminationReason).toBe('max_iterations');
    });

    it('lets the finish call win over other calls in the same response', async () => {
      let executed = false;
      const toolkit = createToolkit({ logger: silentLogger() });
      toolkit.register('side_effect', () => {
        executed = true;
        return ToolResponse.success('ran');
      }, 'Records that it ran');
      const agent = createAgent(
        new ScriptedModel([respond(toolUseBlock('call-1', 'side_effect'), toolUseBlock('call-2', 'generate_response', { response: 'final' }))]),
        { toolkit }
      );

      const result = await agent.reply('go');

      expect(result.getTextContent()).toBe('final');
      expect(executed).toBe(false);
      expect(await agent.memory.size()).toBe(2);
    });

    it('falls back to the response text when the finish call has no answer', async () => {
      const agent = createAgent(
        new ScriptedModel([respond(textBlock('Here you go'), toolUseBlock('call-1', 'generate_response', {}))])
      );

      const result = await agent.reply('go');

      expect(result.content).toEqual([{ type: 'text', text: 'Here you go' }]);
    });

    it('offers every registered tool and the configured tool choice', async () => {
      const model = new ScriptedModel([respondText('ok')]);
      const agent = createAgent(model, { toolChoice: 'echo' });

      await agent.reply('hi');

      expect(model.calls[0].tools.map(tool => tool.function.name)).toEqual(['echo', 'get_current_time', 'generate_response']);
      expect(model.calls[0].toolChoice).toBe('echo');
    });
  });

  describe('tool dispatch', () => {
    const parallelToolkit = (): Toolkit => {
      const toolkit = createToolkit({ logger: silentLogger() });
      toolkit.register(defineTool({
        name: 'a',
        description: 'slow',
        execute: async () => {
          await sleep(30);
          return ToolResponse.success('A');
        },
      }));
      toolkit.register('b', () => {
        throw new Error('b failed');
      }, 'fails');
      toolkit.register('c', () => ToolResponse.success('C'), 'fast');
      return toolkit;
    };

    it('stores parallel results in call order', async () => {
      const agent = createAgent(
        new ScriptedModel([
          respond(toolUseBlock('id-a', 'a'), toolUseBlock('id-b', 'b'), toolUseBlock('id-c', 'c')),
          respondFinish('done'),
        ]),
        { toolkit: parallelToolkit(), parallelToolCalls: true }
      );

      await agent.reply('run all');

      const [, , results] = await agent.memory.getMessages();
      expect(results.content).toEqual([
        { type: 'tool_result', id: 'id-a', name: 'a', output: 'A' },
        { type: 'tool_result', id: 'id-b', name: 'b', output: 'Error: b failed' },
        { type: 'tool_result', id: 'id-c', name: 'c', output: 'C' },
      ]);
    });

    it('reports a timed-out tool to the model as a result', async () => {
      const toolkit = createToolkit({ logger: silentLogger(), executionTimeoutMs: 20 });
      toolkit.register(defineTool({
        name: 'hang',
        description: 'Never returns',
        execute: () => new Promise<ToolResponse>(() => undefined),
      }));
      const agent = createAgent(
        new ScriptedModel([respond(toolUseBlock('call-1', 'hang')), respondFinish('gave up')]),
        { toolkit }
      );

      const result = await agent.reply('wait');

      const [, , results] = await agent.memory.getMessages();
      expect(results.content).toEqual([
        { type: 'tool_result', id: 'call-1', name: 'hang', output: "Error: Tool 'hang' timed out after 20ms" },
      ]);
      expect(result.getTextContent()).toBe('gave up');
    });
  });

  describe('errors', () => {
    it('turns a model failure into an error reply', async () => {
      const agent = createAgent(
        new ScriptedModel([
          () => {
            throw new Error('upstream down');
          },
        ])
      );

      const result = await agent.reply('hi');

      expect(result.getTextContent()).toBe(`${LOOP_ERROR_PREFIX}upstream down`);
      expect(result.metadata).toEqual({ error: true });
      expect(agent.getState()).toMatchObject({ phase: 'errored', running: false, terminationReason: 'error' });
      expect(await texts(agent)).toEqual(['hi']);
    });

    it('bounds each model call when a timeout is set', async () => {
      const agent = createAgent(new ScriptedModel([() => new Promise<ChatResponse>(() => undefined)]), {
        modelTimeoutMs: 20,
      });

      const result = await agent.reply('hi');

      expect(result.getTextContent()).toBe(`${LOOP_ERROR_PREFIX}Model call timed out after 20ms`);
    });

    it('reports an unknown tool choice', async () => {
      const agent = createAgent(new ScriptedModel([respondText('unused')]), { toolChoice: 'nope' });

      const result = await agent.reply('hi');

      expect(result.metadata).toEqual({ error: true });
      expect(result.getTextContent()).toContain("Invalid tool_choice 'nope'");
    });

    it('validates its options', () => {
      const model = new ScriptedModel([]);

      expect(() => createAgent(model, { longTermMemoryMode: 'sometimes' })).toThrow(ValidationError);
      expect(() => createAgent(model, { maxIters: 0 })).toThrow(ValidationError);
      expect(() => createAgent(model).setMaxIters(1.5)).toThrow(ValidationError);
    });
  });

  describe('interruption', () => {
    it('observes the interrupting message and stores the interrupted reply', async () => {
      const { called, step } = blockingStep();
      const agent = createAgent(new ScriptedModel([step]));

      const pending = agent.reply('long task');
      await called;
      expect(agent.isReplying()).toBe(true);
      await agent.interrupt(new Msg('user', 'stop', 'user'));
      const result = await pending;

      expect(result.getTextContent()).toBe(INTERRUPTED_REPLY_TEXT);
      expect(result.metadata).toEqual({ interrupted: true });
      expect(await texts(agent)).toEqual(['long task', 'stop', INTERRUPTED_REPLY_TEXT]);
      expect(agent.getState()).toMatchObject({ phase: 'interrupted', terminationReason: 'interrupted' });
      expect(agent.isReplying()).toBe(false);
    });

    it('supersedes an in-flight reply with a new one', async () => {
      const { called, step } = blockingStep();
      const agent = createAgent(new ScriptedModel([step, respondFinish('second done')]));

      const first = agent.reply('first');
      await called;
      const second = agent.reply('second');

      expect((await first).getTextContent()).toBe(INTERRUPTED_REPLY_TEXT);
      expect((await second).getTextContent()).toBe('second done');
      expect(await texts(agent)).toEqual(['first', INTERRUPTED_REPLY_TEXT, 'second', 'second done']);
    });

    const interruptOnFirstPrint = (agent: ReActAgent): void => {
      let fired = false;
      agent.registerInstanceHook('pre_print', 'interrupt-once', async self => {
        if (!fired) {
          fired = true;
          await self.interrupt(new Msg('user', 'stop', 'user'));
        }
      });
    };

    it('drops a final answer interrupted while it is printed', async () => {
      const agent = createAgent(new ScriptedModel([respondFinish('done')]));
      interruptOnFirstPrint(agent);

      const result = await agent.reply('go');

      expect(result.getTextContent()).toBe(INTERRUPTED_REPLY_TEXT);
      expect(await texts(agent)).toEqual(['go', 'stop', INTERRUPTED_REPLY_TEXT]);
      expect(agent.getState().terminationReason).toBe('interrupted');
    });

    it('does not store or run tool calls interrupted while they are printed', async () => {
      const model = new ScriptedModel([respond(toolUseBlock('call-1', 'echo', { message: 'x' }))]);
      const agent = createAgent(model);
      interruptOnFirstPrint(agent);

      const result = await agent.reply('go');

      expect(result.getTextContent()).toBe(INTERRUPTED_REPLY_TEXT);
      expect(model.calls).toHaveLength(1);
      expect(await texts(agent)).toEqual(['go', 'stop', INTERRUPTED_REPLY_TEXT]);
    });

    it('withdraws the tool call message when interrupted mid-tool', async () => {
      let markStarted: () => void = () => undefined;
      const started = new Promise<void>(resolve => {
        markStarted = resolve;
      });
      const toolkit = createToolkit({ logger: silentLogger() });
      toolkit.register(defineTool({
        name: 'wait',
        description: 'Waits until cancelled',
        execute: () => {
          markStarted();
          return new Promise<ToolResponse>(() => undefined);
        },
      }));
      const agent = createAgent(new ScriptedModel([respond(toolUseBlock('call-1', 'wait'))]), { toolkit });

      const pending = agent.reply('go');
      await started;
      await agent.interrupt(new Msg('user', 'stop', 'user'));
      const result = await pending;

      const stored = await agent.memory.getMessages();
      expect(result.getTextContent()).toBe(INTERRUPTED_REPLY_TEXT);
      expect(stored.map(msg => msg.getTextContent())).toEqual(['go', 'stop', INTERRUPTED_REPLY_TEXT]);
      expect(stored.some(msg => msg.hasContentBlocks('tool_use'))).toBe(false);
    });

    it('runs one reply at a time when several supersede together', async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      let markFirstCall: () => void = () => undefined;
      const firstCall = new Promise<void>(resolve => {
        markFirstCall = resolve;
      });
      const model = new ScriptedModel([], async (messages, signal) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        markFirstCall();
        try {
          const latest = messages.filter(msg => msg.role === 'user').pop();
          if (latest?.getTextContent() === 'c') {
            await sleep(5);
            return respondFinish('c done');
          }
          return await untilAborted(signal);
        } finally {
          inFlight--;
        }
      });
      const agent = createAgent(model);

      const a = agent.reply('a');
      await firstCall;
      const b = agent.reply('b');
      const c = agent.reply('c');
      const results = await Promise.all([a, b, c]);

      expect(results.map(msg => msg.getTextContent())).toEqual([INTERRUPTED_REPLY_TEXT, INTERRUPTED_REPLY_TEXT, 'c done']);
      expect(maxInFlight).toBe(1);
      expect(await texts(agent)).toEqual(['a', INTERRUPTED_REPLY_TEXT, 'b', INTERRUPTED_REPLY_TEXT, 'c', 'c done']);
      expect(agent.isReplying()).toBe(false);
    });

    it('does nothing when no reply is running', async () => {
      const agent = createAgent(new ScriptedModel([]));

      await agent.interrupt(new Msg('user', 'note', 'user'));

      expect(await texts(agent)).toEqual(['note']);
      expect(agent.getState().phase).toBe('idle');
    });
  });

  describe('long-term memory', () => {
    it('injects and records memory under static control', async () => {
      const longTermMemory = new InMemoryLongTermMemory();
      await longTermMemory.store('deploy', 'The deploy target is staging');
      const model = new ScriptedModel([respondFinish('It is staging')]);
      const agent = createAgent(model, { longTermMemory, longTermMemoryMode: 'static_control' });

      await agent.reply('Where is the deploy target?');

      const sent = model.calls[0].messages;
      expect(sent.map(msg => msg.role)).toEqual(['system', 'user']);
      expect(sent[0].getTextContent()).toBe('Relevant long-term memory:\n- The deploy target is staging');
      expect(await agent.memory.size()).toBe(2);

      const hits = await longTermMemory.search('staging');
      expect(hits.map(hit => hit.value)).toEqual(['The deploy target is staging', 'It is staging']);
      expect(hits[1].metadata).toEqual({ source: 'reply', agent: 'Agent', query: 'Where is the deploy target?' });
      expect(agent.toolkit.has('retrieve_from_memory')).toBe(false);
    });

    it('exposes memory tools under agent control', async () => {
      const longTermMemory = new InMemoryLongTermMemory();
      const model = new ScriptedModel([
        respond(toolUseBlock('call-1', 'record_to_memory', { content: 'User likes tea', key: 'pref' })),
        respondFinish('noted'),
      ]);
      const agent = createAgent(model, { longTermMemory, longTermMemoryMode: 'agent_control' });

      await agent.reply('I like tea');

      expect(agent.toolkit.has('retrieve_from_memory')).toBe(true);
      expect((await longTermMemory.retrieve('pref'))?.value).toBe('User likes tea');
      expect(await longTermMemory.size()).toBe(1);
    });

    it('does both by default', async () => {
      const longTermMemory = new InMemoryLongTermMemory();
      const agent = createAgent(new ScriptedModel([respondFinish('ok')]), { longTermMemory });

      await agent.reply('remember this');

      expect(agent.longTermMemoryMode).toBe('both');
      expect(agent.toolkit.has('record_to_memory')).toBe(true);
      expect(await longTermMemory.size()).toBe(1);
    });
  });

  describe('printing', () => {
    const printingAgent = (written: string[], model = new ScriptedModel([])) =>
      createAgent(model, { disableConsoleOutput: false, output: text => written.push(text) });

    it('prints only the new part of a streamed message', async () => {
      const written: string[] = [];
      const agent = printingAgent(written);
      const id = 'stream-1';

      await agent.print(new Msg('Agent', 'Hel', 'assistant', { id }), false);
      await agent.print(new Msg('Agent', 'Hello', 'assistant', { id }), false);
      await agent.print(new Msg('Agent', 'Hello world', 'assistant', { id }), true);

      expect(written).toEqual(['Agent: Hel', 'lo', ' world\n']);
    });

    it('marks thinking and skips empty messages', async () => {
      const written: string[] = [];
      const agent = printingAgent(written);

      await agent.print(new Msg('Agent', [thinkingBlock('plan'), textBlock('answer')], 'assistant'));
      await agent.print(new Msg('Agent', [toolUseBlock('call-1', 'echo')], 'assistant'));

      expect(written).toEqual(['Agent: (thinking) plan\nanswer\n']);
    });

    it('prints the final answer of a reply', async () => {
      const written: string[] = [];
      const agent = printingAgent(
        written,
        new ScriptedModel([respond(toolUseBlock('call-1', 'echo', { message: 'x' })), respondFinish('done')])
      );

      await agent.reply('go');

      expect(written).toEqual(['Agent: done\n']);
    });

    it('stays quiet when console output is disabled', async () => {
      const written: string[] = [];
      const agent = printingAgent(written);
      agent.setConsoleOutputEnabled(false);

      await agent.print(new Msg('Agent', 'hidden', 'assistant'));

      expect(written).toEqual([]);
    });
  });

  describe('subscribers', () => {
    it('broadcasts replies to subscribers until removed', async () => {
      const speaker = createAgent(new ScriptedModel([respondFinish('hello'), respondFinish('again')]));
      const listener = createAgent(new ScriptedModel([]));

      speaker.addSubscribers([listener, speaker]);
      expect(speaker.getSubscribers()).toEqual([listener]);

      await speaker.reply('greet');
      speaker.removeSubscribers([listener]);
      await speaker.reply('greet again');

      expect(await texts(listener)).toEqual(['hello']);
    });
  });
});
