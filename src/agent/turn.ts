// pattern: Functional Core

import type { Turn } from './types.js';

export function createTurn(): Turn {
  return {
    user_text: '',
    assistant_text: '',
    reminder_payload: null,
    assistant_already_emitted: false,
    pending_tool_calls: [],
    tool_results: [],
    working_messages: [],
  };
}

/**
 * Clear every field in place, so holders of the turn object see the reset.
 */
export function resetTurn(turn: Turn): void {
  Object.assign(turn, createTurn());
}
