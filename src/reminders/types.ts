// pattern: Functional Core

/**
 * Reminder domain types.
 * `when` is an ISO-8601 timestamp carrying the local UTC offset at creation time.
 */

export type Reminder = {
  id: string;
  created_at: string;
  task: string;
  when: string;
  notes: string | null;
  completed: boolean;
};

export type NewReminder = {
  task: string;
  when: string;
  notes?: string | null;
};

/**
 * Payload of a reminder_due event: the reminder as it was when it fired.
 */
export type DueReminder = {
  id: string;
  task: string;
  when: string;
  notes: string | null;
};
