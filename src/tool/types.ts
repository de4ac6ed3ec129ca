// pattern: Functional Core

/**
 * Tool system types for registration, execution, and model integration.
 * These types define the port interface for the toolbox and tool handlers.
 */

import type { ToolDefinition as ModelToolDefinition } from '../model/types.js';

export type ToolParameterType = 'string' | 'number' | 'boolean' | 'object' | 'array';

export type ToolParameter = {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum_values?: ReadonlyArray<string>;
  min_length?: number;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ReadonlyArray<ToolParameter>;
};

/**
 * Structured tool output. Failures carry an `error` key; successes carry
 * tool-specific fields, some of which may be shown to the user verbatim.
 */
export type ToolResult = Record<string, unknown>;

export type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResult>;

export type Tool = {
  definition: ToolDefinition;
  /** Status line shown to the user while the tool runs. */
  user_message: string;
  handler: ToolHandler;
};

export interface Toolbox {
  register(tool: Tool): void;
  getTool(name: string): Tool | null;
  getDefinitions(): Array<ToolDefinition>;
  /** Never throws: unknown tools, bad arguments and handler failures come back as `{ error }`. */
  runTool(name: string, args: Record<string, unknown>): Promise<ToolResult>;
  toModelTools(): Array<ModelToolDefinition>;
}
