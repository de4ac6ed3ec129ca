// pattern: Imperative Shell

/**
 * Tests for the agent's dispatch/drain loop: turn commits, tool rounds,
 * step-limit and failure recovery, and queued event processing.
 */

import { describe, it, expect } from 'vitest';
import { createAgent, HANDLER_FAILURE_TEXT, STEP_LIMIT_TEXT } from './agent.js';
import { reminderDueEvent, TICK, userMessageEvent } from './events.js';
import { DEFAULT_HANDLERS } from './states/index.js';
import type { AgentConfig, StateHandlers, StateName } from './types.js';
import type { ModelProvider } from '../model/types.js';
import { createToolbox } from '../tool/registry.js';
import type { Toolbox } from '../tool/types.js';
import { createSilentLogger } from '../logger.js';
import {
  TEST_AGENT_CONFIG,
  TEST_NOW,
  TEST_SYSTEM_PROMPT,
  createRecordingOutput,
  createScriptedModelProvider,
} from '../integration/test-helpers.js';
import type { RecordingOutput, ScriptedReply } from '../integration/test-helpers.js';

function testToolbox(): Toolbox {
  const toolbox = createToolbox(createSilentLogger());
  toolbox.register({
    definition: { name: 'datetime', description: 'Current time', parameters: [] },
    user_message: 'Checking current date and time...',
    handler: async () => ({ time: '10:00:00' }),
  });
  toolbox.register({
    definition: { name: 'set_reminder', description: 'Set a reminder', parameters: [] },
    user_message: 'Setting reminder...',
    handler: async () => ({ success: true, confirmation: 'Reminder set for 11:00.' }),
  });
  return toolbox;
}

// Wraps each handler so the states visited by drain are recorded in order.
function recordVisits(base: StateHandlers, visited: Array<StateName>): StateHandlers {
  const wrap = (state: StateName): StateHandlers[StateName] => async (ctx, event) => {
    if (event.kind === 'tick') {
      visited.push(state);
    }
    return base[state](ctx, event);
  };
  return {
    idle: wrap('idle'),
    generate: wrap('generate'),
    use_tools: wrap('use_tools'),
    task: wrap('task'),
    cleanup: wrap('cleanup'),
  };
}

type Setup = {
  script?: Array<ScriptedReply>;
  model?: ModelProvider;
  config?: Partial<AgentConfig>;
  handlers?: StateHandlers;
};

function setup(options: Setup = {}) {
  const model = createScriptedModelProvider(options.script ?? []);
  const output: RecordingOutput = createRecordingOutput();
  const visited: Array<StateName> = [];
  const agent = createAgent({
    model: options.model ?? model,
    toolbox: testToolbox(),
    output,
    config: { ...TEST_AGENT_CONFIG, ...options.config },
    systemPrompt: TEST_SYSTEM_PROMPT,
    logger: createSilentLogger(),
    now: () => TEST_NOW,
    handlers: recordVisits(options.handlers ?? DEFAULT_HANDLERS, visited),
  });
  return { agent, model, output, visited };
}

const toolCall = { id: 'call-1', name: 'datetime', arguments: '{}' };

describe('createAgent', () => {
  it('starts idle with only the system message in history', () => {
    const { agent } = setup();

    expect(agent.currentState).toBe('idle');
    expect(agent.pendingState).toBeNull();
    expect(agent.getHistory()).toEqual([{ role: 'system', content: TEST_SYSTEM_PROMPT }]);
    expect(agent.isBusy()).toBe(false);
  });

  it('dispatch parks the next state without transitioning', async () => {
    const { agent } = setup();

    await agent.dispatch(userMessageEvent('hello'));

    expect(agent.currentState).toBe('idle');
    expect(agent.pendingState).toBe('generate');
    expect(agent.turn.user_text).toBe('hello');
  });

  it('answers a user message and commits the exchange', async () => {
    const { agent, output } = setup({ script: [{ content: 'Hi there!' }] });

    await agent.dispatch(userMessageEvent('hello'));
    await agent.drain();

    expect(output.lines()).toEqual(['Hi there!']);
    expect(agent.currentState).toBe('idle');
    expect(agent.pendingState).toBeNull();
    expect(agent.getHistory().slice(1)).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'Hi there!' },
    ]);
    expect(agent.turn.working_messages).toEqual([]);
  });

  it('runs a tool round before the final reply', async () => {
    const { agent, model, output, visited } = setup({
      script: [{ content: '', tool_calls: [toolCall] }, { content: 'It is 10:00.' }],
    });

    await agent.dispatch(userMessageEvent('what time is it?'));
    await agent.drain();

    expect(output.records).toEqual([
      { kind: 'status', text: 'Checking current date and time...' },
      { kind: 'text', text: 'It is 10:00.' },
    ]);
    expect(model.requests[1]?.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'tool']);
    expect(agent.getHistory().slice(1).map((m) => m.content)).toEqual(['what time is it?', 'It is 10:00.']);
    expect(visited).toEqual(['generate', 'use_tools', 'generate', 'cleanup']);
  });

  it('answers straight from a reminder tool without a second generation', async () => {
    const { agent, model, output, visited } = setup({
      script: [
        { content: '', tool_calls: [{ id: 'call-2', name: 'set_reminder', arguments: '{}' }] },
        { content: 'never requested' },
      ],
    });

    await agent.dispatch(userMessageEvent('remind me at 11'));
    await agent.drain();

    expect(visited).toEqual(['generate', 'use_tools', 'cleanup']);
    expect(output.records).toEqual([
      { kind: 'status', text: 'Setting reminder...' },
      { kind: 'text', text: 'Reminder set for 11:00.' },
    ]);
    expect(model.requests).toHaveLength(1);
    expect(model.remaining).toBe(1);
    expect(agent.getHistory().slice(1).map((m) => m.content)).toEqual([
      'remind me at 11',
      'Reminder set for 11:00.',
    ]);
  });

  it('recovers with a notice when the step limit is reached', async () => {
    const { agent, output } = setup({
      script: [
        { content: '', tool_calls: [toolCall] },
        { content: '', tool_calls: [toolCall] },
      ],
      config: { max_internal_steps: 3 },
    });

    await agent.dispatch(userMessageEvent('loop forever'));
    await agent.drain();

    expect(output.lines()).toEqual([STEP_LIMIT_TEXT]);
    expect(agent.currentState).toBe('idle');
    expect(agent.pendingState).toBeNull();
    expect(agent.turn.user_text).toBe('');
    expect(agent.getHistory()).toHaveLength(1);
  });

  it('stops a state that keeps returning itself after a single step', async () => {
    const handlers: StateHandlers = {
      ...DEFAULT_HANDLERS,
      generate: async () => 'generate',
    };
    const { agent, output, visited } = setup({ handlers, config: { max_internal_steps: 1 } });

    await agent.dispatch(userMessageEvent('hello'));
    await agent.drain();

    expect(output.lines()).toEqual([STEP_LIMIT_TEXT]);
    expect(visited).toEqual(['generate']);
    expect(agent.currentState).toBe('idle');
    expect(agent.pendingState).toBeNull();
    expect(agent.turn.user_text).toBe('');
    expect(agent.turn.working_messages).toEqual([]);
  });

  it('finishes the turn when the budget runs out on the way back to idle', async () => {
    const { agent, output, visited } = setup({
      script: [{ content: 'Hi' }],
      config: { max_internal_steps: 2 },
    });

    await agent.dispatch(userMessageEvent('hello'));
    await agent.drain();

    expect(visited).toEqual(['generate', 'cleanup']);
    expect(output.lines()).toEqual(['Hi']);
    expect(agent.currentState).toBe('idle');
    expect(agent.pendingState).toBeNull();
    expect(agent.getHistory().slice(1)).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'Hi' },
    ]);
  });

  it('recovers when a handler throws during drain', async () => {
    const handlers: StateHandlers = {
      ...DEFAULT_HANDLERS,
      generate: async () => {
        throw new Error('boom');
      },
    };
    const { agent, output } = setup({ handlers });

    await agent.dispatch(userMessageEvent('hello'));
    await agent.drain();

    expect(output.lines()).toEqual([HANDLER_FAILURE_TEXT]);
    expect(agent.currentState).toBe('idle');
    expect(agent.pendingState).toBeNull();
  });

  it('recovers when a handler throws during dispatch', async () => {
    const handlers: StateHandlers = {
      ...DEFAULT_HANDLERS,
      idle: async () => {
        throw new Error('boom');
      },
    };
    const { agent, output } = setup({ handlers });

    await agent.dispatch(userMessageEvent('hello'));

    expect(output.lines()).toEqual([HANDLER_FAILURE_TEXT]);
    expect(agent.pendingState).toBeNull();
    expect(agent.turn.user_text).toBe('');
  });

  it('treats a second drain with nothing pending as a no-op', async () => {
    const { agent, output } = setup({ script: [{ content: 'Hi' }] });

    await agent.dispatch(userMessageEvent('hello'));
    await agent.drain();
    await agent.drain();

    expect(output.lines()).toEqual(['Hi']);
    expect(agent.currentState).toBe('idle');
  });

  it('ignores a tick while idle', async () => {
    const { agent } = setup();

    await agent.dispatch(TICK);
    await agent.drain();

    expect(agent.currentState).toBe('idle');
    expect(agent.pendingState).toBeNull();
  });

  it('announces a due reminder without adding it to history', async () => {
    const { agent, output } = setup({ script: [{ content: 'Time to stretch!' }] });

    await agent.dispatch(
      reminderDueEvent({ id: 'r1', task: 'stretch', when: '2026-02-18T10:00:00Z', notes: null }),
    );
    await agent.drain();

    expect(output.lines()).toEqual(['Time to stretch!']);
    expect(agent.getHistory()).toHaveLength(1);
  });

  it('commits an apology when generation fails', async () => {
    const { agent } = setup({ script: [{ error: new Error('down') }] });

    await agent.dispatch(userMessageEvent('hello'));
    await agent.drain();

    expect(agent.getHistory().slice(1).map((m) => m.content)).toEqual([
      'hello',
      'Sorry, I hit an internal error while generating a response.',
    ]);
  });

  it('keeps history within the configured bound', async () => {
    const { agent } = setup({
      script: [{ content: 'one' }, { content: 'two' }],
      config: { max_history_messages: 2 },
    });

    await agent.dispatch(userMessageEvent('first'));
    await agent.drain();
    await agent.dispatch(userMessageEvent('second'));
    await agent.drain();

    expect(agent.getHistory()).toEqual([
      { role: 'system', content: TEST_SYSTEM_PROMPT },
      { role: 'user', content: 'second' },
      { role: 'assistant', content: 'two' },
    ]);
  });

  describe('commitTurn', () => {
    it('skips the append when either side is blank but still resets the turn', async () => {
      const { agent } = setup();
      await agent.dispatch(userMessageEvent('hello'));

      agent.commitTurn();

      expect(agent.getHistory()).toHaveLength(1);
      expect(agent.turn.user_text).toBe('');
    });
  });

  describe('queued events', () => {
    it('processes queued events in arrival order and reports the count', async () => {
      const { agent, output } = setup({ script: [{ content: 'A' }, { content: 'B' }] });

      agent.enqueueEvent(userMessageEvent('first'));
      agent.enqueueEvent(userMessageEvent('second'));
      expect(agent.isBusy()).toBe(true);

      expect(await agent.processQueuedEvents()).toBe(2);
      expect(output.lines()).toEqual(['A', 'B']);
      expect(agent.hasQueuedEvents()).toBe(false);
      expect(agent.isBusy()).toBe(false);
    });

    it('returns false when there is nothing to process', async () => {
      const { agent } = setup();

      expect(await agent.processNextQueuedEvent()).toBe(false);
    });

    it('leaves a reminder that arrives mid-turn queued until the turn finishes', async () => {
      const { agent, output } = setup({ script: [{ content: 'Hi' }, { content: 'Stretch now!' }] });

      agent.enqueueEvent(userMessageEvent('hello'));
      agent.enqueueEvent(
        reminderDueEvent({ id: 'r1', task: 'stretch', when: '2026-02-18T10:00:00Z', notes: null }),
      );

      expect(await agent.processNextQueuedEvent()).toBe(true);
      expect(output.lines()).toEqual(['Hi']);
      expect(agent.hasQueuedEvents()).toBe(true);

      await agent.processNextQueuedEvent();
      expect(output.lines()).toEqual(['Hi', 'Stretch now!']);
    });
  });
});
