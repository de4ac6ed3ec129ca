// pattern: Functional Core

export type {
  ChatRole,
  ChatMessage,
  ModelToolCall,
  JsonSchemaObject,
  ToolDefinition,
  ModelRequest,
  StopReason,
  UsageStats,
  AssistantReply,
  ModelResponse,
  StreamChunk,
  ModelErrorCode,
} from "./types.js";

export { ModelError, type ModelProvider } from "./types.js";
export { createAnthropicAdapter } from "./anthropic.js";
export { createOpenAICompatAdapter } from "./openai-compat.js";
export { createModelProvider } from "./factory.js";
export { parseToolArguments, serializeToolArguments } from "./arguments.js";
export { completeStructured, completeText, extractJsonObject } from "./structured.js";
