// pattern: Imperative Shell

/**
 * Layered configuration loading.
 * config/default.toml is required, config/local.toml is merged over it section by
 * section, and environment variables take precedence over both.
 */

import { z } from "zod";
import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { AppConfigSchema } from "./schema.js";
import type { AppConfig } from "./schema.js";

export type { AppConfig, AgentConfig, ModelConfig, DatabaseConfig } from "./schema.js";

export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));

export type Env = Readonly<Record<string, string | undefined>>;

export type LoadConfigOptions = {
  configDir?: string;
  env?: Env;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Section = Record<string, unknown>;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function isRecord(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readToml(path: string): Section {
  const raw = readFileSync(path, "utf-8");
  try {
    return TOML.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`failed to parse ${path}: ${detail}`);
  }
}

function mergeSections(base: Section, override: Section): Section {
  const merged: Section = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return merged;
}

export function parseBoolean(name: string, raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean (true/false), got '${raw}'`);
}

export function parseInteger(name: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigError(`${name} must be an integer, got '${raw}'`);
  }
  return Number.parseInt(trimmed, 10);
}

type Override = {
  variable: string;
  section: "model" | "agent" | "database";
  key: string;
  parse: (name: string, raw: string) => unknown;
};

const asString = (_name: string, raw: string): string => raw.trim();

const ENV_OVERRIDES: ReadonlyArray<Override> = [
  { variable: "NUDGE_PROVIDER", section: "model", key: "provider", parse: asString },
  { variable: "NUDGE_MODEL", section: "model", key: "name", parse: asString },
  { variable: "NUDGE_BASE_URL", section: "model", key: "base_url", parse: asString },
  { variable: "NUDGE_STREAM", section: "model", key: "stream", parse: parseBoolean },
  { variable: "NUDGE_THINK", section: "model", key: "think", parse: parseBoolean },
  { variable: "NUDGE_MAX_INTERNAL_STEPS", section: "agent", key: "max_internal_steps", parse: parseInteger },
  { variable: "NUDGE_MAX_HISTORY_MESSAGES", section: "agent", key: "max_history_messages", parse: parseInteger },
  { variable: "NUDGE_REMINDER_POLL_SECONDS", section: "agent", key: "reminder_poll_seconds", parse: parseInteger },
  { variable: "NUDGE_DEBUG", section: "agent", key: "debug", parse: parseBoolean },
  { variable: "DATABASE_URL", section: "database", key: "url", parse: asString },
];

function applyEnvOverrides(config: Section, env: Env): Section {
  const result: Section = { ...config };

  const setKey = (section: string, key: string, value: unknown): void => {
    const existing = result[section];
    result[section] = { ...(isRecord(existing) ? existing : {}), [key]: value };
  };

  for (const override of ENV_OVERRIDES) {
    const raw = env[override.variable];
    if (raw === undefined || raw.trim() === "") continue;
    setKey(override.section, override.key, override.parse(override.variable, raw));
  }

  // Secrets never live in the TOML files checked into the repo
  const model = result["model"];
  const provider = isRecord(model) ? model["provider"] : undefined;
  const keyVariable = provider === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_COMPAT_API_KEY";
  const apiKey = env[keyVariable]?.trim() || undefined;
  if (apiKey) {
    setKey("model", "api_key", apiKey);
  }

  return result;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const configDir = resolve(options.configDir ?? DEFAULT_CONFIG_DIR);
  const env = options.env ?? process.env;

  const defaultPath = join(configDir, "default.toml");
  if (!existsSync(defaultPath)) {
    throw new ConfigError(`missing configuration file: ${defaultPath}`);
  }

  let merged = readToml(defaultPath);

  const localPath = join(configDir, "local.toml");
  if (existsSync(localPath)) {
    merged = mergeSections(merged, readToml(localPath));
  }

  merged = applyEnvOverrides(merged, env);

  const result = AppConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}
