// pattern: Functional Core

import type { AgentContext, AgentEvent, StateName } from '../types.js';

/**
 * Waits for an external event and starts a turn from it.
 */
export async function handleIdle(ctx: AgentContext, event: AgentEvent): Promise<StateName> {
  switch (event.kind) {
    case 'user_message':
      ctx.turn.user_text = event.payload.trim();
      return 'generate';
    case 'reminder_due':
      ctx.turn.reminder_payload = event.payload;
      ctx.turn.user_text = '';
      return 'task';
    case 'tick':
      return 'idle';
  }
}
