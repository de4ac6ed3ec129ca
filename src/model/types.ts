// pattern: Functional Core

/**
 * Shared types for model providers.
 * Adapters normalize their SDK's wire format to these chat messages, so the agent
 * keeps one message list that any backend can replay in full on every call.
 */

export type ChatRole = "system" | "user" | "assistant" | "tool";

/**
 * A tool call as reported by a backend. `arguments` is whatever the backend sent:
 * a JSON string, an already-decoded object, or garbage. `id` may be missing on
 * backends that do not assign call ids.
 */
export type ModelToolCall = {
  id?: string;
  name: string;
  arguments: unknown;
};

export type ChatMessage = {
  role: ChatRole;
  content: string;
  tool_calls?: ReadonlyArray<ModelToolCall>;
  tool_name?: string;
  tool_call_id?: string;
};

export type JsonSchemaObject = {
  type: "object";
  properties: Record<string, unknown>;
  required: Array<string>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  input_schema: JsonSchemaObject;
};

export type ModelRequest = {
  model: string;
  messages: ReadonlyArray<ChatMessage>;
  tools?: ReadonlyArray<ToolDefinition>;
  max_tokens: number;
  temperature?: number;
  think?: boolean;
  json?: boolean;
};

export type StopReason = "end_turn" | "tool_use" | "max_tokens" | "stop_sequence";

export type UsageStats = {
  input_tokens: number;
  output_tokens: number;
};

export type AssistantReply = {
  content: string;
  tool_calls: Array<ModelToolCall>;
};

export type ModelResponse = {
  message: AssistantReply;
  stop_reason: StopReason;
  usage: UsageStats;
};

/**
 * One streamed fragment. Text arrives incrementally in `content`; tool calls are
 * only reported once complete, on the final chunk where `done` is true.
 */
export type StreamChunk = {
  message: {
    content: string;
    tool_calls?: Array<ModelToolCall>;
  };
  done: boolean;
};

export type ModelErrorCode = "auth" | "rate_limit" | "timeout" | "api_error";

export class ModelError extends Error {
  constructor(
    public code: ModelErrorCode,
    public retryable: boolean = false,
    message: string = ""
  ) {
    super(message);
    this.name = "ModelError";
  }
}

export interface ModelProvider {
  complete(request: ModelRequest): Promise<ModelResponse>;
  stream(request: ModelRequest): AsyncIterable<StreamChunk>;
}
