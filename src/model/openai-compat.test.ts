// pattern: Imperative Shell

import { describe, it, expect, afterEach } from "vitest";
import type OpenAI from "openai";
import {
  buildRequestBody,
  createOpenAICompatAdapter,
  normalizeChunkStream,
  normalizeMessage,
} from "./openai-compat.js";
import type { ModelConfig } from "../config/schema.js";
import type { StreamChunk } from "./types.js";

function makeConfig(overrides: Partial<ModelConfig> = {}): ModelConfig {
  return {
    provider: "openai-compat",
    name: "ministral-3:14b",
    base_url: "http://localhost:11434/v1",
    max_tokens: 1024,
    stream: true,
    think: false,
    ...overrides,
  };
}

function chunk(delta: OpenAI.Chat.ChatCompletionChunk.Choice.Delta): OpenAI.Chat.ChatCompletionChunk {
  return {
    id: "chunk-1",
    object: "chat.completion.chunk",
    created: 0,
    model: "test-model",
    choices: [{ index: 0, delta, finish_reason: null }],
  };
}

async function* fromArray<T>(items: ReadonlyArray<T>): AsyncIterable<T> {
  for (const item of items) {
    yield item;
  }
}

async function collect(stream: AsyncIterable<StreamChunk>): Promise<Array<StreamChunk>> {
  const chunks: Array<StreamChunk> = [];
  for await (const item of stream) {
    chunks.push(item);
  }
  return chunks;
}

describe("createOpenAICompatAdapter", () => {
  afterEach(() => {
    delete process.env["OPENAI_API_KEY"];
  });

  it("should throw without an api key when pointed at the hosted API", () => {
    expect(() =>
      createOpenAICompatAdapter(makeConfig({ base_url: "https://api.openai.com/v1" }))
    ).toThrow("OpenAI-compatible adapter requires api_key");
  });

  it("should accept api_key from environment variable", () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    expect(() =>
      createOpenAICompatAdapter(makeConfig({ base_url: "https://api.openai.com/v1" }))
    ).not.toThrow();
  });

  it("should not need a key for a local server", () => {
    expect(() => createOpenAICompatAdapter(makeConfig())).not.toThrow();
  });
});

describe("normalizeMessage", () => {
  it("maps plain roles", () => {
    expect(normalizeMessage({ role: "system", content: "be brief" })).toEqual({
      role: "system",
      content: "be brief",
    });
    expect(normalizeMessage({ role: "user", content: "hi" })).toEqual({ role: "user", content: "hi" });
  });

  it("encodes assistant tool calls as function calls", () => {
    const message = normalizeMessage({
      role: "assistant",
      content: "",
      tool_calls: [
        { id: "call_a", name: "datetime", arguments: {} },
        { id: "call_b", name: "set_reminder", arguments: '{"request":"stretch at 3pm"}' },
      ],
    });

    expect(message).toEqual({
      role: "assistant",
      content: null,
      tool_calls: [
        { id: "call_a", type: "function", function: { name: "datetime", arguments: "{}" } },
        {
          id: "call_b",
          type: "function",
          function: { name: "set_reminder", arguments: '{"request":"stretch at 3pm"}' },
        },
      ],
    });
  });

  it("carries the call id on tool messages", () => {
    expect(
      normalizeMessage({ role: "tool", content: '{"ok":true}', tool_name: "datetime", tool_call_id: "call_a" })
    ).toEqual({ role: "tool", tool_call_id: "call_a", content: '{"ok":true}' });
  });
});

describe("buildRequestBody", () => {
  it("omits optional fields when unused", () => {
    const body = buildRequestBody({
      model: "m",
      max_tokens: 100,
      messages: [{ role: "user", content: "hi" }],
    });

    expect(body.tools).toBeUndefined();
    expect(body.reasoning_effort).toBeUndefined();
    expect(body.response_format).toBeUndefined();
  });

  it("maps think and json mode", () => {
    const body = buildRequestBody({
      model: "m",
      max_tokens: 100,
      messages: [{ role: "user", content: "hi" }],
      think: true,
      json: true,
    });

    expect(body.reasoning_effort).toBe("medium");
    expect(body.response_format).toEqual({ type: "json_object" });
  });

  it("wraps tool definitions as functions", () => {
    const body = buildRequestBody({
      model: "m",
      max_tokens: 100,
      messages: [],
      tools: [
        {
          name: "datetime",
          description: "Current date and time",
          input_schema: { type: "object", properties: {}, required: [] },
        },
      ],
    });

    expect(body.tools).toEqual([
      {
        type: "function",
        function: {
          name: "datetime",
          description: "Current date and time",
          parameters: { type: "object", properties: {}, required: [] },
        },
      },
    ]);
  });
});

describe("normalizeChunkStream", () => {
  it("streams text and finishes with a done chunk", async () => {
    const chunks = await collect(
      normalizeChunkStream(fromArray([chunk({ content: "Hel" }), chunk({ content: "lo" })]))
    );

    expect(chunks).toEqual([
      { message: { content: "Hel" }, done: false },
      { message: { content: "lo" }, done: false },
      { message: { content: "" }, done: true },
    ]);
  });

  it("assembles fragmented tool calls in index order", async () => {
    const chunks = await collect(
      normalizeChunkStream(
        fromArray([
          chunk({ tool_calls: [{ index: 1, id: "call_2", function: { name: "list_reminders", arguments: "" } }] }),
          chunk({ tool_calls: [{ index: 0, id: "call_1", function: { name: "set_reminder", arguments: '{"req' } }] }),
          chunk({ tool_calls: [{ index: 0, function: { arguments: 'uest":"tea"}' } }] }),
        ])
      )
    );

    expect(chunks).toEqual([
      {
        message: {
          content: "",
          tool_calls: [
            { id: "call_1", name: "set_reminder", arguments: '{"request":"tea"}' },
            { id: "call_2", name: "list_reminders", arguments: "" },
          ],
        },
        done: true,
      },
    ]);
  });
});
