// pattern: Imperative Shell

/**
 * Built-in reminder tools: set, list and delete.
 * The model only extracts fields from the user's words; dates and times are
 * resolved deterministically here before anything is stored.
 */

import { z } from 'zod';
import type { Logger } from '../../logger.js';
import { describeError } from '../../logger.js';
import { completeStructured } from '../../model/structured.js';
import type { ModelProvider } from '../../model/types.js';
import {
  combineDateAndTime,
  formatDottedDate,
  formatLocalContext,
  formatReminderWhen,
  isDatetimePast,
  parseTimeString,
  resolveDateExpression,
} from '../../reminders/datetime.js';
import type { ReminderStore } from '../../reminders/store.js';
import type { Reminder } from '../../reminders/types.js';
import type { Tool, ToolParameter } from '../types.js';

export type ReminderToolDeps = {
  store: ReminderStore;
  model: ModelProvider;
  modelName: string;
  logger: Logger;
  now?: () => Date;
};

const ReminderRequestSchema = z.object({
  task: z.string().trim().min(1),
  time: z.string().trim().min(1),
  intended_date: z.string().trim().min(1).default('today'),
  notes: z.string().nullish(),
});

const ConfirmationSchema = z.object({
  confirmation_message: z.string().trim().min(1),
});

const ReminderMatchSchema = z.object({
  reminder_id: z.string().trim().min(1),
  confidence: z.string().default('high'),
  reason: z.string().nullish(),
});

const EXTRACTION_PROMPT = [
  'You extract reminder request data. Return ONLY a JSON object with the keys',
  '"task", "time", "intended_date" and "notes" (null when there are none).',
  'Do not include markdown, explanations, or extra keys.',
  'Extract the task, time, and intended_date exactly as the user specified.',
  'Do NOT perform any date calculations or conversions.',
  'Do NOT convert time to 24-hour format.',
  "If the user does NOT explicitly mention a date or day (like 'tomorrow' or 'friday'),",
  "set intended_date to 'today'. Do not assume 'tomorrow'.",
].join(' ');

const SET_CONFIRMATION_PROMPT = [
  'You write one short, friendly confirmation for a reminder that was just set.',
  'Use the provided task, date, and time exactly as given.',
  'Do not change or infer a different date or time.',
  'If you mention relative timing (today/tomorrow), it must match the provided current date/time.',
  'Return ONLY a JSON object with the key "confirmation_message".',
].join(' ');

const MATCH_PROMPT = [
  "You match a user's deletion request to a specific reminder.",
  'Analyze the request and the list of available reminders,',
  'then return the exact ID of the reminder they want to delete.',
  'Return ONLY a JSON object with the keys "reminder_id", "confidence" and "reason".',
].join(' ');

const DELETE_CONFIRMATION_PROMPT = [
  'Generate a short confirmation message for a deleted reminder.',
  'Return ONLY a JSON object with the key "confirmation_message".',
].join(' ');

function requestParameter(description: string): ToolParameter {
  return {
    name: 'request',
    type: 'string',
    description,
    required: true,
    min_length: 1,
  };
}

function readRequest(params: Record<string, unknown>): string {
  const request = params['request'];
  return typeof request === 'string' ? request.trim() : '';
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function describeReminders(reminders: ReadonlyArray<Reminder>): string {
  const lines = reminders.map((reminder, index) => {
    const notes = reminder.notes ? `, Notes: ${reminder.notes}` : '';
    return `${index + 1}. ID: ${reminder.id}, Task: ${reminder.task}, When: ${reminder.when}${notes}`;
  });
  return `Available reminders:\n${lines.join('\n')}`;
}

export function buildReminderSummary(
  reminders: ReadonlyArray<{ task: string; when_human: string }>,
): string {
  const lines = reminders.map((reminder, index) => `${index + 1}. **${reminder.task}** – ${reminder.when_human}`);
  return `You have ${reminders.length} reminder(s):\n\n${lines.join('\n')}`;
}

export function createReminderTools(deps: ReminderToolDeps): Array<Tool> {
  const { store, model, modelName } = deps;
  const logger = deps.logger;
  const now = deps.now ?? (() => new Date());

  const set_reminder: Tool = {
    definition: {
      name: 'set_reminder',
      description:
        "Set a reminder when the user asks to be reminded of something. Examples: 'Remind me to drink water at 14:45', 'Remind me to do my homework tomorrow at 19:15'.",
      parameters: [
        requestParameter(
          "The user's reminder request exactly as stated, including both the task and the timing. " +
            "Example: 'remind me to check emails today at 18:30'.",
        ),
      ],
    },
    user_message: 'Setting your reminder...',
    handler: async (params) => {
      const extracted = await completeStructured(
        model,
        ReminderRequestSchema,
        { model: modelName, system: EXTRACTION_PROMPT, user: readRequest(params) },
        logger,
      );
      if (!extracted) {
        logger.warn('set_reminder: extraction failed');
        return {
          error:
            'Could not extract reminder details. Please specify: what to remind you about, what time, and when (today, tomorrow, or a weekday).',
        };
      }

      const time = parseTimeString(extracted.time);
      if (!time) {
        logger.warn(`set_reminder: could not parse time '${extracted.time}'`);
        return {
          error: `Could not parse time '${extracted.time}'. Please use a format like '9:15', '9:15 AM', or '14:30'.`,
        };
      }

      const current = now();
      const day = resolveDateExpression(extracted.intended_date, current);
      if (!day) {
        logger.warn(`set_reminder: could not resolve date '${extracted.intended_date}'`);
        return {
          error: `Could not interpret date '${extracted.intended_date}'. Use 'today', 'tomorrow', or a weekday name.`,
        };
      }

      const when = combineDateAndTime(day, time);

      let reminder: Reminder;
      try {
        reminder = await store.add({ task: extracted.task, when, notes: extracted.notes ?? null });
      } catch (error) {
        logger.error('set_reminder: failed to save reminder', error);
        return { error: `Could not save reminder due to storage error: ${describeError(error)}` };
      }

      const date = formatDottedDate(day);
      const clock = `${pad(time.hour)}:${pad(time.minute)}`;
      const confirmation = await completeStructured(
        model,
        ConfirmationSchema,
        {
          model: modelName,
          system: SET_CONFIRMATION_PROMPT,
          user: [
            `Current local date/time: ${formatLocalContext(current)}`,
            `Task: ${reminder.task}`,
            `Date: ${date}`,
            `Time: ${clock}`,
          ].join('\n'),
        },
        logger,
      );

      return {
        success: true,
        confirmation: confirmation?.confirmation_message ?? `Reminder set: ${reminder.task} on ${date} at ${clock}.`,
        reminder_id: reminder.id,
        task: reminder.task,
        when: reminder.when,
      };
    },
  };

  const list_reminders: Tool = {
    definition: {
      name: 'list_reminders',
      description:
        'List the active reminders when the user asks what reminders they have. This is the source of truth; never answer from memory.',
      parameters: [],
    },
    user_message: 'Fetching your reminders...',
    handler: async () => {
      const reminders = await store.list();
      if (reminders.length === 0) {
        return {
          success: true,
          count: 0,
          message: "You don't have any active reminders.",
          reminders: [],
        };
      }

      const current = now();
      const formatted = reminders.map((reminder, index) => ({
        number: index + 1,
        task: reminder.task,
        when: reminder.when,
        when_human: formatReminderWhen(reminder.when, current),
        id: reminder.id,
        created_at: reminder.created_at,
        notes: reminder.notes,
      }));

      return {
        success: true,
        count: formatted.length,
        reminders: formatted,
        summary: buildReminderSummary(formatted),
      };
    },
  };

  async function cleanupPastReminders(): Promise<void> {
    try {
      const current = now();
      let deleted = 0;
      for (const reminder of await store.list()) {
        if (isDatetimePast(reminder.when, current) && (await store.delete(reminder.id))) {
          deleted++;
        }
      }
      if (deleted > 0) {
        logger.info(`delete_reminder: cleaned up ${deleted} past reminder(s)`);
      }
    } catch (error) {
      logger.error('delete_reminder: cleanup of past reminders failed', error);
    }
  }

  const delete_reminder: Tool = {
    definition: {
      name: 'delete_reminder',
      description:
        "Delete an existing reminder when the user asks to remove or cancel one. Examples: 'Delete my water reminder', 'Cancel reminder number 2'.",
      parameters: [
        requestParameter(
          "The user's deletion request describing which reminder to delete. It can reference the task, the time, or the position in the list.",
        ),
      ],
    },
    user_message: 'Deleting your reminder...',
    handler: async (params) => {
      const reminders = await store.list();
      if (reminders.length === 0) {
        return { error: "You don't have any active reminders to delete." };
      }

      const match = await completeStructured(
        model,
        ReminderMatchSchema,
        {
          model: modelName,
          system: MATCH_PROMPT,
          user: `${describeReminders(reminders)}\n\nUser request: ${readRequest(params)}`,
        },
        logger,
      );
      if (!match) {
        logger.warn('delete_reminder: could not match request to a reminder');
        return { error: 'Could not identify which reminder you want to delete. Please be more specific.' };
      }

      const reminder = await store.getById(match.reminder_id);
      if (!reminder) {
        logger.warn(`delete_reminder: matched id ${match.reminder_id} does not exist`);
        return { error: 'The matched reminder could not be found in the database.' };
      }

      try {
        if (!(await store.delete(reminder.id))) {
          return { error: 'Failed to delete the reminder from the database.' };
        }
      } catch (error) {
        logger.error('delete_reminder: delete failed', error);
        return { error: `Could not delete reminder due to error: ${describeError(error)}` };
      }

      await cleanupPastReminders();

      const confirmation = await completeStructured(
        model,
        ConfirmationSchema,
        {
          model: modelName,
          system: DELETE_CONFIRMATION_PROMPT,
          user: `Deleted reminder - Task: ${reminder.task}, When: ${reminder.when}`,
        },
        logger,
      );

      return {
        success: true,
        confirmation: confirmation?.confirmation_message ?? `Reminder deleted: ${reminder.task} (${reminder.when}).`,
        deleted_reminder: { task: reminder.task, when: reminder.when, id: reminder.id },
      };
    },
  };

  return [set_reminder, list_reminders, delete_reminder];
}
