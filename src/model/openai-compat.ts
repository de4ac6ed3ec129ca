// pattern: Imperative Shell

import OpenAI from "openai";
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
import { serializeToolArguments } from "./arguments.js";
import { callWithRetry } from "./retry.js";

const OPENAI_HOST = "api.openai.com";
// Local servers (Ollama, llama.cpp, vLLM) ignore the key but the SDK insists on one
const LOCAL_API_KEY = "not-needed";

function isRetryableError(error: unknown): boolean {
  if (error instanceof ModelError) {
    return error.retryable;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (message.includes("timeout") || message.includes("econnrefused")) {
      return true;
    }
  }
  return false;
}

function mapError(error: unknown): unknown {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out");
  }
  if (error instanceof OpenAI.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof OpenAI.APIError) {
    return new ModelError("api_error", false, error.message || "api error");
  }
  return error;
}

function normalizeToolDefinitions(
  tools: ReadonlyArray<ToolDefinition>
): Array<OpenAI.Chat.ChatCompletionTool> {
  return tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.input_schema,
    },
  }));
}

export function normalizeMessage(msg: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (msg.role) {
    case "system":
      return { role: "system", content: msg.content };
    case "user":
      return { role: "user", content: msg.content };
    case "tool":
      return { role: "tool", tool_call_id: msg.tool_call_id ?? "", content: msg.content };
    case "assistant": {
      if (!msg.tool_calls || msg.tool_calls.length === 0) {
        return { role: "assistant", content: msg.content };
      }
      return {
        role: "assistant",
        content: msg.content || null,
        tool_calls: msg.tool_calls.map((call, index) => ({
          id: call.id ?? `call_${index}`,
          type: "function" as const,
          function: {
            name: call.name,
            arguments: serializeToolArguments(call.arguments),
          },
        })),
      };
    }
  }
}

function normalizeStopReason(finishReason: string | null): StopReason {
  if (finishReason === "tool_calls") {
    return "tool_use";
  }
  if (finishReason === "length") {
    return "max_tokens";
  }
  if (finishReason === "stop") {
    return "end_turn";
  }
  return "stop_sequence";
}

function normalizeUsage(usage: OpenAI.Completions.CompletionUsage | undefined): UsageStats {
  return {
    input_tokens: usage?.prompt_tokens ?? 0,
    output_tokens: usage?.completion_tokens ?? 0,
  };
}

function normalizeToolCalls(
  toolCalls: ReadonlyArray<OpenAI.Chat.ChatCompletionMessageToolCall> | undefined
): Array<ModelToolCall> {
  return (toolCalls ?? []).map((call) => ({
    id: call.id || undefined,
    name: call.function.name,
    arguments: call.function.arguments,
  }));
}

export function buildRequestBody(request: ModelRequest): OpenAI.Chat.ChatCompletionCreateParamsNonStreaming {
  return {
    model: request.model,
    max_tokens: request.max_tokens,
    temperature: request.temperature,
    messages: request.messages.map(normalizeMessage),
    ...(request.tools && request.tools.length > 0 ? { tools: normalizeToolDefinitions(request.tools) } : {}),
    ...(request.think ? { reasoning_effort: "medium" as const } : {}),
    ...(request.json ? { response_format: { type: "json_object" as const } } : {}),
  };
}

/**
 * Turn SDK chunks into stream chunks. Tool calls arrive as fragments keyed by
 * index and are only reported whole, on the final chunk.
 */
export async function* normalizeChunkStream(
  stream: AsyncIterable<OpenAI.Chat.ChatCompletionChunk>
): AsyncIterable<StreamChunk> {
  const toolCallMap = new Map<number, { id: string; name: string; arguments: string }>();

  try {
    for await (const event of stream) {
      const choice = event.choices[0];
      if (!choice) continue;

      if (choice.delta.content) {
        yield { message: { content: choice.delta.content }, done: false };
      }

      for (const toolCall of choice.delta.tool_calls ?? []) {
        const current = toolCallMap.get(toolCall.index) ?? { id: "", name: "", arguments: "" };
        if (toolCall.id) {
          current.id = toolCall.id;
        }
        if (toolCall.function?.name) {
          current.name = toolCall.function.name;
        }
        if (toolCall.function?.arguments) {
          current.arguments += toolCall.function.arguments;
        }
        toolCallMap.set(toolCall.index, current);
      }
    }
  } catch (error) {
    throw mapError(error);
  }

  const toolCalls = Array.from(toolCallMap.entries())
    .sort(([a], [b]) => a - b)
    .map(([, call]): ModelToolCall => ({
      id: call.id || undefined,
      name: call.name,
      arguments: call.arguments,
    }));

  yield {
    message: toolCalls.length > 0 ? { content: "", tool_calls: toolCalls } : { content: "" },
    done: true,
  };
}

function resolveApiKey(config: ModelConfig): string {
  const apiKey = config.api_key || process.env["OPENAI_API_KEY"];
  if (apiKey) {
    return apiKey;
  }
  if (new URL(config.base_url).host === OPENAI_HOST) {
    throw new Error(
      "OpenAI-compatible adapter requires api_key in config or OPENAI_API_KEY environment variable"
    );
  }
  return LOCAL_API_KEY;
}

export function createOpenAICompatAdapter(config: ModelConfig, client?: OpenAI): ModelProvider {
  const openai = client ?? new OpenAI({
    apiKey: resolveApiKey(config),
    baseURL: config.base_url,
  });

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
      const response = await send(() => openai.chat.completions.create(buildRequestBody(request)));

      const choice = response.choices[0];
      if (!choice) {
        throw new ModelError("api_error", false, "no choices in response");
      }

      return {
        message: {
          content: choice.message.content ?? "",
          tool_calls: normalizeToolCalls(choice.message.tool_calls),
        },
        stop_reason: normalizeStopReason(choice.finish_reason),
        usage: normalizeUsage(response.usage),
      };
    },

    async *stream(request: ModelRequest): AsyncIterable<StreamChunk> {
      const stream = await send(() =>
        openai.chat.completions.create({ ...buildRequestBody(request), stream: true })
      );

      yield* normalizeChunkStream(stream);
    },
  };
}
