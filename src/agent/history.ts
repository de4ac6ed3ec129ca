// pattern: Functional Core

/**
 * Bounded conversation history.
 * The system message sits at index 0 for the agent's lifetime and is never
 * trimmed; everything after it is capped at `maxMessages`, oldest dropped first.
 */

import type { ChatMessage } from '../model/types.js';

export type History = {
  messages(): ReadonlyArray<ChatMessage>;
  append(message: ChatMessage): void;
  trim(): void;
  readonly length: number;
};

export function createHistory(systemPrompt: string, maxMessages: number): History {
  if (!Number.isInteger(maxMessages) || maxMessages < 1) {
    throw new Error(`max history messages must be a positive integer, got ${maxMessages}`);
  }

  const system: ChatMessage = { role: 'system', content: systemPrompt };
  let rest: Array<ChatMessage> = [];

  return {
    messages(): ReadonlyArray<ChatMessage> {
      return [system, ...rest];
    },

    append(message: ChatMessage): void {
      rest.push(message);
    },

    trim(): void {
      if (rest.length > maxMessages) {
        rest = rest.slice(rest.length - maxMessages);
      }
    },

    get length(): number {
      return rest.length + 1;
    },
  };
}
