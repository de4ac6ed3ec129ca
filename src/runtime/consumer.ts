// pattern: Imperative Shell

/**
 * The single consumer of agent events.
 * Producers submit events from event-loop callbacks; one processing run at a
 * time drains the agent's queue, and events submitted during a run are picked
 * up by that same run.
 */

import { describeError } from '../logger.js';
import type { Logger } from '../logger.js';
import type { Agent, AgentEvent } from '../agent/types.js';

export type EventConsumer = {
  submit(event: AgentEvent): void;
  /** Start a run if none is active; resolves when the queue is empty. */
  notify(): Promise<void>;
  /** Wait for the in-flight run, if any. */
  settle(): Promise<void>;
  isBusy(): boolean;
};

export function createEventConsumer(agent: Agent, logger: Logger): EventConsumer {
  let inFlight: Promise<void> | null = null;

  async function run(): Promise<void> {
    try {
      const processed = await agent.processQueuedEvents();
      logger.debug(`processed ${processed} event(s)`);
    } catch (error) {
      // agent recovers handler failures itself; anything here is a bug in the loop
      logger.error('event processing failed', error);
    }
  }

  function notify(): Promise<void> {
    if (!inFlight) {
      inFlight = run().then(() => {
        inFlight = null;
        // an event may land between the last queue check and this callback
        if (agent.hasQueuedEvents()) {
          return notify();
        }
        return undefined;
      });
    }
    return inFlight;
  }

  return {
    submit(event: AgentEvent): void {
      agent.enqueueEvent(event);
      notify().catch((error: unknown) => {
        logger.error(`event processing error: ${describeError(error)}`);
      });
    },

    notify,

    async settle(): Promise<void> {
      if (inFlight) {
        await inFlight;
      }
    },

    isBusy(): boolean {
      return inFlight !== null || agent.isBusy();
    },
  };
}
