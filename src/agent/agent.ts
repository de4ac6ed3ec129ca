// pattern: Imperative Shell

/**
 * Event-driven agent.
 * External events are dispatched to the current state's handler; `drain` then
 * advances through the internal states with synthetic ticks until the turn is
 * back at idle. Every exit path leaves the agent idle with nothing pending.
 */

import { TICK } from './events.js';
import { createEventQueue } from './event-queue.js';
import { createHistory } from './history.js';
import { DEFAULT_HANDLERS } from './states/index.js';
import { createTurn, resetTurn as clearTurn } from './turn.js';
import type { Agent, AgentContext, AgentDependencies, AgentEvent, StateName } from './types.js';

export const STEP_LIMIT_TEXT =
  'I hit an internal step limit while processing that request. Please split it into smaller steps and try again.';
export const HANDLER_FAILURE_TEXT = 'Sorry, something went wrong while handling that request.';

export function createAgent(deps: AgentDependencies): Agent {
  const handlers = deps.handlers ?? DEFAULT_HANDLERS;
  const logger = deps.logger;
  const history = createHistory(deps.systemPrompt, deps.config.max_history_messages);
  const queue = createEventQueue<AgentEvent>();
  const turn = createTurn();

  let current: StateName = 'idle';
  let pending: StateName | null = null;

  function commitTurn(): void {
    const userText = turn.user_text.trim();
    const assistantText = turn.assistant_text.trim();
    if (userText && assistantText) {
      history.append({ role: 'user', content: userText });
      history.append({ role: 'assistant', content: assistantText });
      history.trim();
    }
    clearTurn(turn);
  }

  const context: AgentContext = {
    turn,
    history,
    toolbox: deps.toolbox,
    model: deps.model,
    output: deps.output,
    config: deps.config,
    logger,
    now: deps.now ?? (() => new Date()),
    commitTurn,
  };

  function recover(text: string): void {
    deps.output.emitText(text);
    clearTurn(turn);
    current = 'idle';
    pending = null;
  }

  async function runHandler(state: StateName, event: AgentEvent): Promise<StateName> {
    const next = await handlers[state](context, event);
    if (next !== state) {
      logger.debug(`${state} -> ${next} (${event.kind})`);
    }
    return next;
  }

  async function dispatch(event: AgentEvent): Promise<void> {
    try {
      pending = await runHandler(current, event);
    } catch (error) {
      logger.error(`state ${current} failed on ${event.kind}`, error);
      recover(HANDLER_FAILURE_TEXT);
    }
  }

  async function drain(): Promise<void> {
    let steps = 0;

    try {
      while (pending !== null && steps < deps.config.max_internal_steps) {
        current = pending;
        pending = null;
        if (current === 'idle') {
          break;
        }
        pending = await runHandler(current, TICK);
        steps += 1;
      }
    } catch (error) {
      logger.error(`state ${current} failed during drain`, error);
      recover(HANDLER_FAILURE_TEXT);
      return;
    }

    if (pending === 'idle') {
      current = 'idle';
      pending = null;
    }

    if (pending !== null) {
      logger.warn(`step limit of ${deps.config.max_internal_steps} reached in ${current}`);
      recover(STEP_LIMIT_TEXT);
    }

    if (current === 'idle') {
      pending = null;
    }
  }

  async function processNextQueuedEvent(): Promise<boolean> {
    const event = queue.takeOne();
    if (event === null) {
      return false;
    }
    await dispatch(event);
    await drain();
    return true;
  }

  return {
    dispatch,
    drain,
    commitTurn,

    resetTurn(): void {
      clearTurn(turn);
    },

    enqueueEvent(event: AgentEvent): void {
      queue.enqueue(event);
    },

    hasQueuedEvents(): boolean {
      return queue.hasPending();
    },

    processNextQueuedEvent,

    async processQueuedEvents(): Promise<number> {
      let processed = 0;
      while (await processNextQueuedEvent()) {
        processed++;
      }
      return processed;
    },

    isBusy(): boolean {
      return current !== 'idle' || queue.hasPending();
    },

    getHistory() {
      return history.messages();
    },

    get currentState(): StateName {
      return current;
    },

    get pendingState(): StateName | null {
      return pending;
    },

    get turn() {
      return turn;
    },
  };
}
