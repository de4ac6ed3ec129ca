// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createEventQueue } from './event-queue.js';
import { reminderDueEvent, userMessageEvent } from './events.js';
import type { AgentEvent } from './types.js';

describe('createEventQueue', () => {
  it('returns events in arrival order regardless of kind', () => {
    const queue = createEventQueue<AgentEvent>();
    queue.enqueue(userMessageEvent('first'));
    queue.enqueue(reminderDueEvent({ id: 'r1', task: 'stretch', when: '2026-02-18T10:00:00Z', notes: null }));
    queue.enqueue(userMessageEvent('third'));

    expect(queue.length).toBe(3);
    expect(queue.takeOne()).toEqual({ kind: 'user_message', payload: 'first' });
    expect(queue.takeOne()?.kind).toBe('reminder_due');
    expect(queue.takeOne()).toEqual({ kind: 'user_message', payload: 'third' });
  });

  it('returns null and reports nothing pending when empty', () => {
    const queue = createEventQueue<AgentEvent>();

    expect(queue.hasPending()).toBe(false);
    expect(queue.takeOne()).toBeNull();
  });

  it('does not coalesce duplicate events', () => {
    const queue = createEventQueue<AgentEvent>();
    const event = userMessageEvent('same');
    queue.enqueue(event);
    queue.enqueue(event);

    expect(queue.length).toBe(2);
  });
});

describe('event factories', () => {
  it('freezes events and their reminder payloads', () => {
    const event = reminderDueEvent({ id: 'r1', task: 'stretch', when: 'now', notes: null });

    expect(Object.isFrozen(event)).toBe(true);
    expect(event.kind === 'reminder_due' && Object.isFrozen(event.payload)).toBe(true);
  });
});
