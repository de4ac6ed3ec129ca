// pattern: Functional Core

/**
 * ReminderStore port interface.
 * Implementations must be safe to call from the agent's tools and the reminder
 * poller at the same time.
 */

import type { NewReminder, Reminder } from './types.js';

export interface ReminderStore {
  add(reminder: NewReminder): Promise<Reminder>;
  getById(id: string): Promise<Reminder | null>;
  /** Newest first. Completed reminders are excluded unless asked for. */
  list(options?: { includeCompleted?: boolean }): Promise<Array<Reminder>>;
  /** False when the reminder does not exist or was already completed. */
  markCompleted(id: string): Promise<boolean>;
  delete(id: string): Promise<boolean>;
}

export class ReminderValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReminderValidationError';
  }
}

function requiredText(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new ReminderValidationError(`${field} must be a string`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ReminderValidationError(`${field} must be a non-empty string`);
  }
  return trimmed;
}

function optionalText(value: unknown, field: string): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new ReminderValidationError(`${field} must be a string`);
  }
  return value.trim() || null;
}

export function normalizeNewReminder(reminder: NewReminder): Required<NewReminder> {
  return {
    task: requiredText(reminder.task, 'task'),
    when: requiredText(reminder.when, 'when'),
    notes: optionalText(reminder.notes, 'notes'),
  };
}
