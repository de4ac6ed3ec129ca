// pattern: Functional Core

/**
 * Shared in-process fakes for tests.
 * Nothing here reaches a model server, a database or the terminal.
 */

import type {
  AssistantReply,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  ModelToolCall,
  StreamChunk,
} from '../model/types.js';
import type { OutputSink } from '../terminal/types.js';
import type { ReminderStore } from '../reminders/store.js';
import { normalizeNewReminder } from '../reminders/store.js';
import type { NewReminder, Reminder } from '../reminders/types.js';
import type { Logger } from '../logger.js';
import { createLogger, createSilentLogger } from '../logger.js';
import type { AgentConfig, AgentContext } from '../agent/types.js';
import { createHistory } from '../agent/history.js';
import { createTurn } from '../agent/turn.js';
import { createToolbox } from '../tool/registry.js';

export type ScriptedReply =
  | { content: string; tool_calls?: Array<ModelToolCall> }
  | { error: Error };

export type ScriptedModelProvider = ModelProvider & {
  readonly requests: Array<ModelRequest>;
  /** Replies not consumed yet. */
  readonly remaining: number;
};

/**
 * A model that answers each call, streamed or not, with the next scripted reply.
 * Streamed replies are split into chunks of `chunkSize` characters, with tool
 * calls on the final chunk the way the adapters report them.
 */
export function createScriptedModelProvider(
  script: ReadonlyArray<ScriptedReply>,
  chunkSize = 4,
): ScriptedModelProvider {
  const replies = [...script];
  const requests: Array<ModelRequest> = [];

  function next(request: ModelRequest): AssistantReply {
    requests.push({ ...request, messages: [...request.messages] });
    const reply = replies.shift();
    if (reply === undefined) {
      throw new Error('scripted model has no replies left');
    }
    if ('error' in reply) {
      throw reply.error;
    }
    return { content: reply.content, tool_calls: reply.tool_calls ?? [] };
  }

  return {
    requests,

    get remaining(): number {
      return replies.length;
    },

    async complete(request: ModelRequest): Promise<ModelResponse> {
      const message = next(request);
      return {
        message,
        stop_reason: message.tool_calls.length > 0 ? 'tool_use' : 'end_turn',
        usage: { input_tokens: 0, output_tokens: 0 },
      };
    },

    async *stream(request: ModelRequest): AsyncIterable<StreamChunk> {
      const message = next(request);
      for (let i = 0; i < message.content.length; i += chunkSize) {
        yield { message: { content: message.content.slice(i, i + chunkSize) }, done: false };
      }
      yield {
        message: message.tool_calls.length > 0
          ? { content: '', tool_calls: message.tool_calls }
          : { content: '' },
        done: true,
      };
    },
  };
}

export type OutputRecord =
  | { kind: 'text'; text: string }
  | { kind: 'status'; text: string }
  | { kind: 'begin_stream' }
  | { kind: 'chunk'; text: string }
  | { kind: 'end_stream' };

export type RecordingOutput = OutputSink & {
  readonly records: Array<OutputRecord>;
  /** Every emitted text line, with each stream section joined into one entry. */
  lines(): Array<string>;
};

export function createRecordingOutput(): RecordingOutput {
  const records: Array<OutputRecord> = [];

  return {
    records,

    emitText(text: string): void {
      if (text) records.push({ kind: 'text', text });
    },
    emitStatus(text: string): void {
      if (text) records.push({ kind: 'status', text });
    },
    beginStream(): void {
      records.push({ kind: 'begin_stream' });
    },
    emitStreamChunk(text: string): void {
      if (text) records.push({ kind: 'chunk', text });
    },
    endStream(): void {
      records.push({ kind: 'end_stream' });
    },

    lines(): Array<string> {
      const lines: Array<string> = [];
      let streamed: string | null = null;
      for (const record of records) {
        switch (record.kind) {
          case 'text':
            lines.push(record.text);
            break;
          case 'begin_stream':
            streamed = '';
            break;
          case 'chunk':
            streamed = (streamed ?? '') + record.text;
            break;
          case 'end_stream':
            lines.push(streamed ?? '');
            streamed = null;
            break;
          case 'status':
            break;
        }
      }
      return lines;
    },
  };
}

export type MemoryReminderStore = ReminderStore & {
  readonly reminders: ReadonlyArray<Reminder>;
};

export function createInMemoryReminderStore(initial: ReadonlyArray<NewReminder> = []): MemoryReminderStore {
  const rows: Array<Reminder> = [];
  let sequence = 0;

  function insert(reminder: NewReminder): Reminder {
    const fields = normalizeNewReminder(reminder);
    sequence++;
    const row: Reminder = {
      id: `reminder-${sequence}`,
      created_at: new Date(Date.UTC(2026, 0, 1, 0, 0, sequence)).toISOString(),
      task: fields.task,
      when: fields.when,
      notes: fields.notes,
      completed: false,
    };
    rows.push(row);
    return { ...row };
  }

  for (const reminder of initial) {
    insert(reminder);
  }

  return {
    get reminders(): ReadonlyArray<Reminder> {
      return rows.map((row) => ({ ...row }));
    },

    async add(reminder: NewReminder): Promise<Reminder> {
      return insert(reminder);
    },

    async getById(id: string): Promise<Reminder | null> {
      const row = rows.find((candidate) => candidate.id === id);
      return row ? { ...row } : null;
    },

    async list(options: { includeCompleted?: boolean } = {}): Promise<Array<Reminder>> {
      return rows
        .filter((row) => options.includeCompleted || !row.completed)
        .reverse()
        .map((row) => ({ ...row }));
    },

    async markCompleted(id: string): Promise<boolean> {
      const row = rows.find((candidate) => candidate.id === id);
      if (!row || row.completed) {
        return false;
      }
      row.completed = true;
      return true;
    },

    async delete(id: string): Promise<boolean> {
      const index = rows.findIndex((candidate) => candidate.id === id);
      if (index === -1) {
        return false;
      }
      rows.splice(index, 1);
      return true;
    },
  };
}

export type CapturingLogger = Logger & {
  readonly lines: Array<string>;
};

/**
 * Logger that keeps its lines in memory, timestamps pinned to one instant.
 */
export function createCapturingLogger(scope = 'test', debug = true): CapturingLogger {
  const lines: Array<string> = [];
  const logger = createLogger(scope, {
    debug,
    now: () => TEST_NOW,
    write: (line) => lines.push(line),
  });
  return Object.assign(logger, { lines });
}

export const TEST_AGENT_CONFIG: AgentConfig = {
  model_name: 'test-model',
  max_tokens: 256,
  stream: false,
  think: false,
  max_internal_steps: 8,
  max_history_messages: 20,
};

/** Wednesday 18 February 2026, 10:00 local time. */
export const TEST_NOW = new Date(2026, 1, 18, 10, 0, 0);

export const TEST_SYSTEM_PROMPT = 'You are a test assistant.';

/**
 * A state handler context with inert defaults; pass what the test inspects.
 */
export function createTestContext(overrides: Partial<AgentContext> = {}): AgentContext {
  return {
    turn: createTurn(),
    history: createHistory(TEST_SYSTEM_PROMPT, TEST_AGENT_CONFIG.max_history_messages),
    toolbox: createToolbox(createSilentLogger()),
    model: createScriptedModelProvider([]),
    output: createRecordingOutput(),
    config: TEST_AGENT_CONFIG,
    logger: createSilentLogger(),
    now: () => TEST_NOW,
    commitTurn: () => {},
    ...overrides,
  };
}
