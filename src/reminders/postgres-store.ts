// pattern: Imperative Shell

/**
 * PostgreSQL implementation of the ReminderStore port.
 */

import { randomUUID } from 'node:crypto';
import type { PersistenceProvider } from '../persistence/types.js';
import type { ReminderStore } from './store.js';
import { normalizeNewReminder } from './store.js';
import type { NewReminder, Reminder } from './types.js';

type ReminderRow = {
  id: string;
  created_at: Date | string;
  task: string;
  when_time: string;
  notes: string | null;
  completed: boolean;
};

const COLUMNS = 'id, created_at, task, when_time, notes, completed';

function parseReminder(row: ReminderRow): Reminder {
  return {
    id: row.id,
    created_at: row.created_at instanceof Date ? row.created_at.toISOString() : String(row.created_at),
    task: row.task,
    when: row.when_time,
    notes: row.notes,
    completed: row.completed,
  };
}

export function createPostgresReminderStore(persistence: PersistenceProvider): ReminderStore {
  return {
    async add(reminder: NewReminder): Promise<Reminder> {
      const { task, when, notes } = normalizeNewReminder(reminder);
      const rows = await persistence.query<ReminderRow>(
        `INSERT INTO reminders (id, task, when_time, notes)
         VALUES ($1, $2, $3, $4)
         RETURNING ${COLUMNS}`,
        [randomUUID(), task, when, notes],
      );
      const row = rows[0];
      if (!row) {
        throw new Error('failed to insert reminder');
      }
      return parseReminder(row);
    },

    async getById(id: string): Promise<Reminder | null> {
      const rows = await persistence.query<ReminderRow>(
        `SELECT ${COLUMNS} FROM reminders WHERE id = $1`,
        [id],
      );
      const row = rows[0];
      return row ? parseReminder(row) : null;
    },

    async list(options: { includeCompleted?: boolean } = {}): Promise<Array<Reminder>> {
      const where = options.includeCompleted ? '' : 'WHERE completed = FALSE';
      const rows = await persistence.query<ReminderRow>(
        `SELECT ${COLUMNS} FROM reminders ${where} ORDER BY created_at DESC, id DESC`,
      );
      return rows.map(parseReminder);
    },

    async markCompleted(id: string): Promise<boolean> {
      const rows = await persistence.query<{ id: string }>(
        'UPDATE reminders SET completed = TRUE WHERE id = $1 AND completed = FALSE RETURNING id',
        [id],
      );
      return rows.length > 0;
    },

    async delete(id: string): Promise<boolean> {
      const rows = await persistence.query<{ id: string }>(
        'DELETE FROM reminders WHERE id = $1 RETURNING id',
        [id],
      );
      return rows.length > 0;
    },
  };
}
