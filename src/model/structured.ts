// pattern: Imperative Shell

/**
 * JSON-mode completions validated against a zod schema.
 * Used by tools that need the model to extract fields rather than chat.
 */

import type { z } from "zod";
import type { Logger } from "../logger.js";
import { describeError } from "../logger.js";
import type { ChatMessage, ModelProvider } from "./types.js";

export type StructuredRequest = {
  model: string;
  system: string;
  user: string;
  max_tokens?: number;
};

const DEFAULT_MAX_TOKENS = 512;

/**
 * Pull the first JSON object out of a reply. Models wrap JSON in code fences or
 * prose often enough that a strict parse alone is not sufficient.
 */
export function extractJsonObject(text: string): unknown {
  const trimmed = text.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    const start = trimmed.indexOf("{");
    const end = trimmed.lastIndexOf("}");
    if (start === -1 || end <= start) {
      return null;
    }
    try {
      return JSON.parse(trimmed.slice(start, end + 1));
    } catch {
      return null;
    }
  }
}

export async function completeStructured<T extends z.ZodTypeAny>(
  model: ModelProvider,
  schema: T,
  request: StructuredRequest,
  logger?: Logger,
): Promise<z.infer<T> | null> {
  const messages: Array<ChatMessage> = [
    { role: "system", content: request.system },
    { role: "user", content: request.user },
  ];

  let content: string;
  try {
    const response = await model.complete({
      model: request.model,
      messages,
      max_tokens: request.max_tokens ?? DEFAULT_MAX_TOKENS,
      temperature: 0,
      json: true,
    });
    content = response.message.content;
  } catch (error) {
    logger?.warn(`structured completion failed: ${describeError(error)}`);
    return null;
  }

  const parsed = schema.safeParse(extractJsonObject(content));
  if (!parsed.success) {
    logger?.warn(`structured completion did not match schema: ${content.slice(0, 200)}`);
    return null;
  }
  return parsed.data;
}

/**
 * Plain-text completion that degrades to a fallback instead of throwing.
 */
export async function completeText(
  model: ModelProvider,
  request: StructuredRequest,
  fallback: string,
  logger?: Logger,
): Promise<string> {
  try {
    const response = await model.complete({
      model: request.model,
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.user },
      ],
      max_tokens: request.max_tokens ?? DEFAULT_MAX_TOKENS,
    });
    const text = response.message.content.trim();
    return text || fallback;
  } catch (error) {
    logger?.warn(`text completion failed, using fallback: ${describeError(error)}`);
    return fallback;
  }
}
