// pattern: Imperative Shell

/**
 * Calls the model with the turn's working messages and either records the
 * reply or queues the tool calls it asked for.
 */

import { randomUUID } from 'node:crypto';
import { parseToolArguments } from '../../model/arguments.js';
import type { AssistantReply, ModelRequest, ModelToolCall } from '../../model/types.js';
import type { AgentContext, AgentEvent, PendingToolCall, StateName } from '../types.js';

export const GENERATE_ERROR_TEXT = 'Sorry, I hit an internal error while generating a response.';

function buildRequest(ctx: AgentContext): ModelRequest {
  return {
    model: ctx.config.model_name,
    messages: ctx.turn.working_messages,
    tools: ctx.toolbox.toModelTools(),
    max_tokens: ctx.config.max_tokens,
    ...(ctx.config.think ? { think: true } : {}),
  };
}

async function streamReply(ctx: AgentContext, request: ModelRequest): Promise<AssistantReply> {
  let content = '';
  const toolCalls: Array<ModelToolCall> = [];
  let opened = false;

  try {
    for await (const chunk of ctx.model.stream(request)) {
      const text = chunk.message.content;
      if (text) {
        if (!opened) {
          ctx.output.beginStream();
          opened = true;
        }
        ctx.output.emitStreamChunk(text);
        content += text;
      }
      if (chunk.message.tool_calls) {
        toolCalls.push(...chunk.message.tool_calls);
      }
    }
  } finally {
    if (opened) {
      ctx.output.endStream();
    }
  }

  return { content, tool_calls: toolCalls };
}

function toPendingCalls(ctx: AgentContext, calls: ReadonlyArray<ModelToolCall>): Array<PendingToolCall> {
  const pending: Array<PendingToolCall> = [];

  for (const call of calls) {
    const name = call.name.trim();
    if (!name) {
      ctx.logger.warn('dropping tool call without a name');
      continue;
    }

    let args = parseToolArguments(call.arguments);
    if (args === null) {
      ctx.logger.warn(`tool call ${name} has unparsable arguments, using {}`);
      args = {};
    }

    pending.push({ id: call.id ?? randomUUID(), name, args });
  }

  return pending;
}

export async function handleGenerate(ctx: AgentContext, event: AgentEvent): Promise<StateName> {
  if (event.kind !== 'tick') {
    return 'generate';
  }

  const { turn } = ctx;
  if (turn.working_messages.length === 0) {
    turn.working_messages = [
      ...ctx.history.messages(),
      { role: 'user', content: turn.user_text },
    ];
  }

  const request = buildRequest(ctx);
  let reply: AssistantReply;
  try {
    reply = ctx.config.stream
      ? await streamReply(ctx, request)
      : (await ctx.model.complete(request)).message;
  } catch (error) {
    ctx.logger.error('model call failed in generate', error);
    turn.assistant_text = GENERATE_ERROR_TEXT;
    turn.assistant_already_emitted = false;
    ctx.output.emitText(GENERATE_ERROR_TEXT);
    return 'cleanup';
  }

  const calls = toPendingCalls(ctx, reply.tool_calls);
  if (calls.length > 0) {
    turn.assistant_already_emitted = false;
    turn.working_messages.push({
      role: 'assistant',
      content: reply.content,
      tool_calls: calls.map((call) => ({ id: call.id, name: call.name, arguments: call.args })),
    });
    turn.pending_tool_calls.push(...calls);
    ctx.logger.debug(`queued tool calls: ${calls.map((call) => call.name).join(', ')}`);
    return 'use_tools';
  }

  const text = reply.content.trim();
  turn.assistant_text = text;
  turn.assistant_already_emitted = ctx.config.stream && text.length > 0;
  if (text && !turn.assistant_already_emitted) {
    ctx.output.emitText(text);
  }
  return 'cleanup';
}
