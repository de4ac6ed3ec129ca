// pattern: Functional Core
import { z } from "zod";

const DEFAULT_BASE_URL = "http://localhost:11434/v1";

const ModelConfigSchema = z
  .object({
    provider: z.enum(["anthropic", "openai-compat"]).default("openai-compat"),
    name: z.string().min(1).default("ministral-3:14b"),
    api_key: z.string().optional(),
    base_url: z.string().url().default(DEFAULT_BASE_URL),
    max_tokens: z.number().int().positive().default(1024),
    stream: z.boolean().default(true),
    think: z.boolean().default(false),
  })
  .superRefine((data, ctx) => {
    if (data.think && data.provider !== "openai-compat") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "think is only supported by the openai-compat provider",
        path: ["think"],
      });
    }
  });

const AgentConfigSchema = z.object({
  max_internal_steps: z.number().int().positive().default(8),
  max_history_messages: z.number().int().min(2).default(20),
  reminder_poll_seconds: z.number().int().positive().default(30),
  debug: z.boolean().default(false),
});

const DatabaseConfigSchema = z.object({
  url: z.string().min(1),
});

const AppConfigSchema = z.object({
  model: ModelConfigSchema.default({}),
  agent: AgentConfigSchema.default({}),
  database: DatabaseConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

export { AppConfigSchema, ModelConfigSchema, AgentConfigSchema, DatabaseConfigSchema };
