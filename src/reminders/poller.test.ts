// pattern: Imperative Shell

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createReminderPoller } from './poller.js';
import type { DueReminder } from './types.js';
import {
  TEST_NOW,
  createCapturingLogger,
  createInMemoryReminderStore,
} from '../integration/test-helpers.js';

const PAST = '2026-02-18T08:00:00Z';
const FUTURE = '2099-01-01T08:00:00Z';

function setup(reminders: Array<{ task: string; when: string; notes?: string | null }>) {
  const store = createInMemoryReminderStore(reminders);
  const due: Array<DueReminder> = [];
  const logger = createCapturingLogger('reminders');
  const poller = createReminderPoller({
    store,
    onDue: (reminder) => due.push(reminder),
    intervalSeconds: 30,
    logger,
    now: () => TEST_NOW,
  });
  return { store, due, logger, poller };
}

describe('createReminderPoller', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('announces due reminders and marks them completed', async () => {
    const { store, due, poller } = setup([
      { task: 'stretch', when: PAST, notes: 'both arms' },
      { task: 'later', when: FUTURE },
    ]);

    expect(await poller.pollOnce()).toBe(1);
    expect(due).toEqual([{ id: 'reminder-1', task: 'stretch', when: PAST, notes: 'both arms' }]);
    expect(store.reminders.map((r) => r.completed)).toEqual([true, false]);
  });

  it('fires each reminder only once across polls', async () => {
    const { due, poller } = setup([{ task: 'stretch', when: PAST }]);

    await poller.pollOnce();
    expect(await poller.pollOnce()).toBe(0);
    expect(due).toHaveLength(1);
  });

  it('treats a reminder due exactly now as due', async () => {
    const { poller } = setup([{ task: 'now', when: TEST_NOW.toISOString() }]);

    expect(await poller.pollOnce()).toBe(1);
  });

  it('skips reminders whose time cannot be parsed', async () => {
    const { due, poller } = setup([{ task: 'odd', when: 'next tuesday-ish' }]);

    expect(await poller.pollOnce()).toBe(0);
    expect(due).toEqual([]);
  });

  it('does not announce a reminder that someone else completed first', async () => {
    const { store, due, poller } = setup([{ task: 'stretch', when: PAST }]);
    vi.spyOn(store, 'markCompleted').mockResolvedValueOnce(false);

    expect(await poller.pollOnce()).toBe(0);
    expect(due).toEqual([]);
  });

  it('polls on start and again after each interval until stopped', async () => {
    vi.useFakeTimers();
    const { store, due, poller } = setup([{ task: 'first', when: PAST }]);

    poller.start();
    expect(poller.running).toBe(true);
    await vi.advanceTimersByTimeAsync(0);
    expect(due.map((r) => r.task)).toEqual(['first']);

    await store.add({ task: 'second', when: PAST });
    await vi.advanceTimersByTimeAsync(30_000);
    expect(due.map((r) => r.task)).toEqual(['first', 'second']);

    await poller.stop();
    await store.add({ task: 'third', when: PAST });
    await vi.advanceTimersByTimeAsync(60_000);
    expect(due).toHaveLength(2);
    expect(poller.running).toBe(false);
  });

  it('logs a failed poll and keeps going', async () => {
    vi.useFakeTimers();
    const { store, due, logger, poller } = setup([{ task: 'stretch', when: PAST }]);
    vi.spyOn(store, 'list').mockRejectedValueOnce(new Error('connection lost'));

    poller.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(logger.lines.at(-1)).toBe('2026-02-18 10:00:00 - ERROR - reminders - reminder poll failed: connection lost');

    await vi.advanceTimersByTimeAsync(30_000);
    expect(due).toHaveLength(1);
    await poller.stop();
  });
});
