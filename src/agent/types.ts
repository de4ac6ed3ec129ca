// pattern: Functional Core

/**
 * Agent types for the event-driven turn loop.
 * These types define the events the agent consumes, the per-turn scratch state,
 * the state handler contract, and the public interface for the agent.
 */

import type { ChatMessage, ModelProvider } from '../model/types.js';
import type { Toolbox, ToolResult } from '../tool/types.js';
import type { DueReminder } from '../reminders/types.js';
import type { OutputSink } from '../terminal/types.js';
import type { Logger } from '../logger.js';
import type { History } from './history.js';

export type StateName = 'idle' | 'generate' | 'use_tools' | 'task' | 'cleanup';

/**
 * External events come from producers; `tick` is only ever synthesized by the
 * agent itself to advance internal states.
 */
export type AgentEvent =
  | { readonly kind: 'user_message'; readonly payload: string }
  | { readonly kind: 'reminder_due'; readonly payload: DueReminder }
  | { readonly kind: 'tick' };

export type PendingToolCall = {
  id: string;
  name: string;
  args: Record<string, unknown>;
};

export type ToolOutcome = {
  name: string;
  args: Record<string, unknown>;
  result: ToolResult;
};

export type Turn = {
  user_text: string;
  assistant_text: string;
  reminder_payload: DueReminder | null;
  assistant_already_emitted: boolean;
  pending_tool_calls: Array<PendingToolCall>;
  tool_results: Array<ToolOutcome>;
  working_messages: Array<ChatMessage>;
};

export type AgentConfig = {
  model_name: string;
  max_tokens: number;
  stream: boolean;
  think: boolean;
  max_internal_steps: number;
  max_history_messages: number;
};

/**
 * Everything a state handler may touch. Handlers mutate `turn` in place and
 * return the name of the state to move to; they never transition directly.
 */
export type AgentContext = {
  readonly turn: Turn;
  readonly history: History;
  readonly toolbox: Toolbox;
  readonly model: ModelProvider;
  readonly output: OutputSink;
  readonly config: AgentConfig;
  readonly logger: Logger;
  now(): Date;
  commitTurn(): void;
};

export type StateHandler = (ctx: AgentContext, event: AgentEvent) => Promise<StateName>;

export type StateHandlers = Readonly<Record<StateName, StateHandler>>;

export type AgentDependencies = {
  model: ModelProvider;
  toolbox: Toolbox;
  output: OutputSink;
  config: AgentConfig;
  systemPrompt: string;
  logger: Logger;
  handlers?: StateHandlers;
  now?: () => Date;
};

export type Agent = {
  /** Run the current state's handler once; the result is parked as the pending state. */
  dispatch(event: AgentEvent): Promise<void>;
  /** Advance through internal states until idle or the step budget runs out. */
  drain(): Promise<void>;
  commitTurn(): void;
  resetTurn(): void;
  enqueueEvent(event: AgentEvent): void;
  hasQueuedEvents(): boolean;
  processNextQueuedEvent(): Promise<boolean>;
  processQueuedEvents(): Promise<number>;
  isBusy(): boolean;
  getHistory(): ReadonlyArray<ChatMessage>;
  readonly currentState: StateName;
  readonly pendingState: StateName | null;
  readonly turn: Readonly<Turn>;
};
