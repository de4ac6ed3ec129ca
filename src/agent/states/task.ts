// pattern: Imperative Shell

/**
 * Turns a due reminder into a short notification for the user.
 */

import { completeText } from '../../model/structured.js';
import { formatLocalContext } from '../../reminders/datetime.js';
import type { DueReminder } from '../../reminders/types.js';
import type { AgentContext, AgentEvent, StateName } from '../types.js';

export const REMINDER_FALLBACK_TEXT = "Hey, just a reminder: it's time now.";

const NOTIFICATION_PROMPT = [
  'Write one short, friendly reminder notification for the user.',
  'The reminder is due now, so tell them it is time to do the task now.',
  'Focus only on this task and optional notes.',
  'Do not mention other reminders, future timing, or scheduling actions.',
  'Return plain text only.',
  'The reminder will be deleted after this notification, so do not include instructions about snoozing or rescheduling.',
].join(' ');

export function buildNotificationPrompt(reminder: DueReminder, now: Date): string {
  const task = reminder.task.trim() || 'your reminder';
  const when = reminder.when.trim() || 'now';
  const notes = reminder.notes?.trim() ?? '';

  const lines = [
    `Current local date/time: ${formatLocalContext(now)}`,
    `Task: ${task}`,
    `Due at: ${when}`,
  ];
  if (notes) {
    lines.push(`Notes: ${notes}`);
  }
  return lines.join('\n');
}

export async function handleTask(ctx: AgentContext, event: AgentEvent): Promise<StateName> {
  if (event.kind !== 'tick') {
    return 'task';
  }

  const reminder = ctx.turn.reminder_payload;
  if (reminder) {
    const message = await completeText(
      ctx.model,
      {
        model: ctx.config.model_name,
        system: NOTIFICATION_PROMPT,
        user: buildNotificationPrompt(reminder, ctx.now()),
        max_tokens: ctx.config.max_tokens,
      },
      REMINDER_FALLBACK_TEXT,
      ctx.logger,
    );

    ctx.turn.assistant_text = message;
    ctx.turn.assistant_already_emitted = false;
    ctx.output.emitText(message);
    ctx.logger.debug(`notified reminder ${reminder.id}`);
  }

  return 'cleanup';
}
