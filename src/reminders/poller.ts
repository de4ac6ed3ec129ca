// pattern: Imperative Shell

/**
 * Timer-driven producer of due reminders.
 * Each poll marks due reminders completed before announcing them, so a reminder
 * fires at most once even if a poll overlaps a slow consumer.
 */

import type { Logger } from '../logger.js';
import { isDatetimePast } from './datetime.js';
import type { ReminderStore } from './store.js';
import type { DueReminder } from './types.js';

export type ReminderPollerDeps = {
  store: ReminderStore;
  onDue: (reminder: DueReminder) => void;
  intervalSeconds: number;
  logger: Logger;
  now?: () => Date;
};

export type ReminderPoller = {
  pollOnce(now?: Date): Promise<number>;
  start(): void;
  stop(): Promise<void>;
  readonly running: boolean;
};

export function createReminderPoller(deps: ReminderPollerDeps): ReminderPoller {
  const now = deps.now ?? (() => new Date());
  let timer: NodeJS.Timeout | null = null;
  let running = false;
  let inFlight: Promise<void> | null = null;

  async function pollOnce(at: Date = now()): Promise<number> {
    const reminders = await deps.store.list();
    const due = reminders.filter((reminder) => isDatetimePast(reminder.when, at));

    if (due.length > 0) {
      deps.logger.info(`found ${due.length} due reminder(s)`);
    }

    let queued = 0;
    for (const reminder of due) {
      if (!(await deps.store.markCompleted(reminder.id))) {
        continue;
      }
      deps.onDue({
        id: reminder.id,
        task: reminder.task,
        when: reminder.when,
        notes: reminder.notes,
      });
      queued++;
    }
    return queued;
  }

  async function tick(): Promise<void> {
    try {
      await pollOnce();
    } catch (error) {
      deps.logger.error('reminder poll failed', error);
    }
  }

  function schedule(): void {
    if (!running) return;
    timer = setTimeout(() => {
      timer = null;
      inFlight = tick().finally(() => {
        inFlight = null;
        schedule();
      });
    }, deps.intervalSeconds * 1000);
  }

  return {
    pollOnce,

    start(): void {
      if (running) return;
      running = true;
      deps.logger.info(`reminder poller started (every ${deps.intervalSeconds}s)`);
      inFlight = tick().finally(() => {
        inFlight = null;
        schedule();
      });
    },

    async stop(): Promise<void> {
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      if (inFlight) {
        await inFlight;
      }
    },

    get running(): boolean {
      return running;
    },
  };
}
