// pattern: Imperative Shell

/**
 * Runs one queued tool call per tick. A few tools produce text meant for the
 * user as-is; when such a tool is the last call of the round, its text becomes
 * the reply and the model is not consulted again.
 */

import type { ToolResult } from '../../tool/types.js';
import type { AgentContext, AgentEvent, StateName } from '../types.js';

const DIRECT_RESPONSE_FIELDS: Readonly<Record<string, string>> = {
  set_reminder: 'confirmation',
  delete_reminder: 'confirmation',
  list_reminders: 'summary',
};

function directResponse(name: string, result: ToolResult): string | null {
  const field = DIRECT_RESPONSE_FIELDS[name];
  if (field === undefined || 'error' in result) {
    return null;
  }
  const value = result[field];
  if (typeof value !== 'string') {
    return null;
  }
  return value.trim() || null;
}

function toolMessageContent(name: string, result: ToolResult): string {
  if (name === 'list_reminders' && typeof result['summary'] === 'string') {
    return JSON.stringify({
      success: result['success'],
      count: result['count'],
      summary: result['summary'],
    });
  }
  return JSON.stringify(result);
}

export async function handleUseTools(ctx: AgentContext, event: AgentEvent): Promise<StateName> {
  if (event.kind !== 'tick') {
    return 'use_tools';
  }

  const { turn } = ctx;
  const call = turn.pending_tool_calls.shift();
  if (!call) {
    return 'generate';
  }

  const tool = ctx.toolbox.getTool(call.name);
  if (tool) {
    ctx.output.emitStatus(tool.user_message);
  }

  ctx.logger.debug(`running tool ${call.name}`);
  const result = await ctx.toolbox.runTool(call.name, call.args);
  ctx.logger.debug(`tool ${call.name} finished${'error' in result ? ' with error' : ''}`);

  turn.tool_results.push({ name: call.name, args: call.args, result });
  turn.working_messages.push({
    role: 'tool',
    tool_name: call.name,
    tool_call_id: call.id,
    content: toolMessageContent(call.name, result),
  });

  const direct = turn.pending_tool_calls.length === 0 ? directResponse(call.name, result) : null;
  if (direct !== null) {
    turn.assistant_text = direct;
    turn.assistant_already_emitted = false;
    ctx.output.emitText(direct);
    return 'cleanup';
  }

  return turn.pending_tool_calls.length > 0 ? 'use_tools' : 'generate';
}
