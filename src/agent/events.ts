// pattern: Functional Core

import type { DueReminder } from '../reminders/types.js';
import type { AgentEvent } from './types.js';

export function userMessageEvent(text: string): AgentEvent {
  return Object.freeze({ kind: 'user_message', payload: text });
}

export function reminderDueEvent(reminder: DueReminder): AgentEvent {
  return Object.freeze({ kind: 'reminder_due', payload: Object.freeze({ ...reminder }) });
}

export const TICK: AgentEvent = Object.freeze({ kind: 'tick' });
