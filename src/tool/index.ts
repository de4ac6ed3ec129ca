// pattern: Functional Core

export type {
  ToolParameterType,
  ToolParameter,
  ToolDefinition,
  ToolResult,
  ToolHandler,
  Tool,
  Toolbox,
} from './types.js';

export { createToolbox, buildArgumentSchema } from './registry.js';
export { createDatetimeTool } from './builtin/datetime.js';
export { createReminderTools, buildReminderSummary } from './builtin/reminders.js';
