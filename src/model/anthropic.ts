// pattern: Imperative Shell

import Anthropic from "@anthropic-ai/sdk";
import type { ModelConfig } from "../config/schema.js";
import type {
  ChatMessage,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  ModelToolCall,
  StopReason,
  StreamChunk,
  ToolDefinition,
  UsageStats,
} from "./types.js";
import { ModelError } from "./types.js";
import { parseToolArguments } from "./arguments.js";
import { callWithRetry } from "./retry.js";

// Prefilled assistant turn that pins the reply to a JSON object
const JSON_PREFILL = "{";

function isRetryableError(error: unknown): boolean {
  if (error instanceof ModelError) {
    return error.retryable;
  }
  if (error instanceof Error && error.message.includes("timeout")) {
    return true;
  }
  return false;
}

function mapError(error: unknown): unknown {
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out");
  }
  if (error instanceof Anthropic.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof Anthropic.APIError) {
    return new ModelError("api_error", false, error.message || "api error");
  }
  return error;
}

export function buildAnthropicSystemParam(
  messages: ReadonlyArray<ChatMessage>,
): string | undefined {
  const systemContents = messages
    .filter((msg) => msg.role === "system" && msg.content)
    .map((msg) => msg.content);

  return systemContents.length > 0 ? systemContents.join("\n\n") : undefined;
}

function normalizeToolDefinitions(
  tools: ReadonlyArray<ToolDefinition>
): Array<Anthropic.Messages.Tool> {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: tool.input_schema,
  }));
}

function toToolUseBlock(call: ModelToolCall, index: number): Anthropic.Messages.ToolUseBlockParam {
  return {
    type: "tool_use",
    id: call.id ?? `toolu_${index}`,
    name: call.name,
    input: parseToolArguments(call.arguments) ?? {},
  };
}

/**
 * Convert chat messages to Anthropic's alternating format.
 * Consecutive tool messages collapse into one user turn of tool_result blocks,
 * which must directly follow the assistant turn that requested them.
 */
export function normalizeMessages(
  messages: ReadonlyArray<ChatMessage>,
): Array<Anthropic.Messages.MessageParam> {
  const result: Array<Anthropic.Messages.MessageParam> = [];
  let pendingResults: Array<Anthropic.Messages.ToolResultBlockParam> = [];

  const flushResults = (): void => {
    if (pendingResults.length > 0) {
      result.push({ role: "user", content: pendingResults });
      pendingResults = [];
    }
  };

  for (const msg of messages) {
    if (msg.role === "system") {
      continue;
    }

    if (msg.role === "tool") {
      pendingResults.push({
        type: "tool_result",
        tool_use_id: msg.tool_call_id ?? "",
        content: msg.content,
      });
      continue;
    }

    flushResults();

    if (msg.role === "assistant" && msg.tool_calls && msg.tool_calls.length > 0) {
      const content: Array<Anthropic.Messages.ContentBlockParam> = [];
      if (msg.content) {
        content.push({ type: "text", text: msg.content });
      }
      content.push(...msg.tool_calls.map(toToolUseBlock));
      result.push({ role: "assistant", content });
      continue;
    }

    result.push({ role: msg.role === "assistant" ? "assistant" : "user", content: msg.content });
  }

  flushResults();
  return result;
}

function normalizeStopReason(reason: string | null): StopReason {
  switch (reason) {
    case "tool_use":
      return "tool_use";
    case "max_tokens":
      return "max_tokens";
    case "stop_sequence":
      return "stop_sequence";
    default:
      return "end_turn";
  }
}

function normalizeUsage(usage: { input_tokens: number; output_tokens: number }): UsageStats {
  return {
    input_tokens: usage.input_tokens,
    output_tokens: usage.output_tokens,
  };
}

export function buildRequestBody(
  request: ModelRequest,
): Anthropic.Messages.MessageCreateParamsNonStreaming {
  const messages = normalizeMessages(request.messages);
  if (request.json) {
    messages.push({ role: "assistant", content: JSON_PREFILL });
  }

  const system = buildAnthropicSystemParam(request.messages);

  return {
    model: request.model,
    max_tokens: request.max_tokens,
    messages,
    ...(system !== undefined ? { system } : {}),
    ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    ...(request.tools && request.tools.length > 0 ? { tools: normalizeToolDefinitions(request.tools) } : {}),
  };
}

/**
 * Turn SDK stream events into stream chunks. Tool input arrives as partial JSON
 * per content block and is reported whole on the final chunk.
 */
export async function* normalizeEventStream(
  stream: AsyncIterable<Anthropic.Messages.RawMessageStreamEvent>
): AsyncIterable<StreamChunk> {
  const toolUses = new Map<number, { id: string; name: string; json: string }>();

  try {
    for await (const event of stream) {
      if (event.type === "content_block_start" && event.content_block.type === "tool_use") {
        toolUses.set(event.index, {
          id: event.content_block.id,
          name: event.content_block.name,
          json: "",
        });
      } else if (event.type === "content_block_delta") {
        if (event.delta.type === "text_delta" && event.delta.text) {
          yield { message: { content: event.delta.text }, done: false };
        } else if (event.delta.type === "input_json_delta") {
          const current = toolUses.get(event.index);
          if (current) {
            current.json += event.delta.partial_json;
          }
        }
      }
    }
  } catch (error) {
    throw mapError(error);
  }

  const toolCalls = Array.from(toolUses.entries())
    .sort(([a], [b]) => a - b)
    .map(([, use]): ModelToolCall => ({ id: use.id, name: use.name, arguments: use.json }));

  yield {
    message: toolCalls.length > 0 ? { content: "", tool_calls: toolCalls } : { content: "" },
    done: true,
  };
}

export function createAnthropicAdapter(config: ModelConfig, client?: Anthropic): ModelProvider {
  const apiKey = config.api_key || process.env["ANTHROPIC_API_KEY"];

  if (!client && !apiKey) {
    throw new Error(
      "anthropic adapter requires api_key in config or ANTHROPIC_API_KEY environment variable"
    );
  }

  const anthropic = client ?? new Anthropic({ apiKey });

  async function send<T>(fn: () => Promise<T>): Promise<T> {
    return callWithRetry(async () => {
      try {
        return await fn();
      } catch (error) {
        throw mapError(error);
      }
    }, isRetryableError);
  }

  return {
    async complete(request: ModelRequest): Promise<ModelResponse> {
      const response = await send(() => anthropic.messages.create(buildRequestBody(request)));

      let text = "";
      const toolCalls: Array<ModelToolCall> = [];
      for (const block of response.content) {
        if (block.type === "text") {
          text += block.text;
        } else if (block.type === "tool_use") {
          toolCalls.push({ id: block.id, name: block.name, arguments: block.input });
        }
        // thinking blocks are not surfaced
      }

      return {
        message: {
          content: request.json ? JSON_PREFILL + text : text,
          tool_calls: toolCalls,
        },
        stop_reason: normalizeStopReason(response.stop_reason),
        usage: normalizeUsage(response.usage),
      };
    },

    async *stream(request: ModelRequest): AsyncIterable<StreamChunk> {
      const stream = await send(() =>
        anthropic.messages.create({ ...buildRequestBody(request), stream: true })
      );

      if (request.json) {
        yield { message: { content: JSON_PREFILL }, done: false };
      }

      yield* normalizeEventStream(stream);
    },
  };
}
