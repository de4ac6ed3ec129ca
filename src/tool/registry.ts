// pattern: Imperative Shell

/**
 * Toolbox implementation.
 * Manages tool registration, argument validation against each tool's declared
 * parameters, and execution that reports failures as results.
 */

import { z } from 'zod';
import type { ToolDefinition as ModelToolDefinition } from '../model/types.js';
import type { Logger } from '../logger.js';
import { describeError } from '../logger.js';
import type { Tool, ToolDefinition, ToolParameter, ToolResult, Toolbox } from './types.js';

function baseSchema(param: ToolParameter): z.ZodTypeAny {
  switch (param.type) {
    case 'string': {
      const text = param.min_length !== undefined ? z.string().min(param.min_length) : z.string();
      const allowed = param.enum_values;
      if (!allowed) {
        return text;
      }
      return text.refine((value) => allowed.includes(value), {
        message: `must be one of: ${allowed.join(', ')}`,
      });
    }
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'object':
      return z.record(z.unknown());
    case 'array':
      return z.array(z.unknown());
  }
}

function parameterSchema(param: ToolParameter): z.ZodTypeAny {
  const schema = baseSchema(param);
  return param.required ? schema : schema.nullish();
}

export function buildArgumentSchema(definition: ToolDefinition): z.ZodObject<z.ZodRawShape> {
  const shape: z.ZodRawShape = {};
  for (const param of definition.parameters) {
    shape[param.name] = parameterSchema(param);
  }
  return z.object(shape);
}

export function createToolbox(logger?: Logger): Toolbox {
  const tools = new Map<string, Tool>();
  const schemas = new Map<string, z.ZodObject<z.ZodRawShape>>();

  return {
    register(tool: Tool): void {
      if (tools.has(tool.definition.name)) {
        throw new Error(
          `tool already registered: ${tool.definition.name}`,
        );
      }
      tools.set(tool.definition.name, tool);
      schemas.set(tool.definition.name, buildArgumentSchema(tool.definition));
    },

    getTool(name: string): Tool | null {
      return tools.get(name) ?? null;
    },

    getDefinitions(): Array<ToolDefinition> {
      return Array.from(tools.values()).map((tool) => tool.definition);
    },

    async runTool(
      name: string,
      args: Record<string, unknown>,
    ): Promise<ToolResult> {
      const tool = tools.get(name);
      const schema = schemas.get(name);
      if (!tool || !schema) {
        return { error: `Tool not found: ${name}` };
      }

      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        logger?.warn(`invalid arguments for ${name}: ${parsed.error.message}`);
        return {
          error: 'Invalid arguments',
          details: parsed.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        };
      }

      try {
        return await tool.handler(parsed.data);
      } catch (error) {
        logger?.error(`tool ${name} failed`, error);
        return { error: describeError(error) };
      }
    },

    toModelTools(): Array<ModelToolDefinition> {
      return Array.from(tools.values()).map((tool) => {
        const properties: Record<string, unknown> = {};
        const required: Array<string> = [];

        for (const param of tool.definition.parameters) {
          properties[param.name] = {
            type: param.type,
            description: param.description,
            ...(param.enum_values ? { enum: param.enum_values } : {}),
            ...(param.min_length !== undefined ? { minLength: param.min_length } : {}),
          };

          if (param.required) {
            required.push(param.name);
          }
        }

        return {
          name: tool.definition.name,
          description: tool.definition.description,
          input_schema: {
            type: 'object',
            properties,
            required,
          },
        };
      });
    },
  };
}
