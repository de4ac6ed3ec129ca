// pattern: Functional Core

import type { AgentContext, AgentEvent, StateName } from '../types.js';

export async function handleCleanup(ctx: AgentContext, event: AgentEvent): Promise<StateName> {
  if (event.kind !== 'tick') {
    return 'cleanup';
  }
  ctx.commitTurn();
  return 'idle';
}
