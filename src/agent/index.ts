// pattern: Functional Core

export type {
  Agent,
  AgentConfig,
  AgentContext,
  AgentDependencies,
  AgentEvent,
  PendingToolCall,
  StateHandler,
  StateHandlers,
  StateName,
  ToolOutcome,
  Turn,
} from './types.js';
export type { History } from './history.js';
export type { EventQueue } from './event-queue.js';

export { createAgent, STEP_LIMIT_TEXT, HANDLER_FAILURE_TEXT } from './agent.js';
export { createHistory } from './history.js';
export { createEventQueue } from './event-queue.js';
export { createTurn, resetTurn } from './turn.js';
export { userMessageEvent, reminderDueEvent, TICK } from './events.js';
export { loadSystemPrompt, FALLBACK_SYSTEM_PROMPT } from './context.js';
export { DEFAULT_HANDLERS, GENERATE_ERROR_TEXT, REMINDER_FALLBACK_TEXT } from './states/index.js';
