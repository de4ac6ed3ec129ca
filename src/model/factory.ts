// pattern: Imperative Shell

import type { ModelConfig } from "../config/schema.js";
import type { Logger } from "../logger.js";
import type { ModelProvider } from "./types.js";
import { createAnthropicAdapter } from "./anthropic.js";
import { createOpenAICompatAdapter } from "./openai-compat.js";

export function createModelProvider(config: ModelConfig, logger?: Logger): ModelProvider {
  switch (config.provider) {
    case "anthropic":
      logger?.info(`model backend: anthropic (${config.name})`);
      return createAnthropicAdapter(config);
    case "openai-compat":
      logger?.info(`model backend: openai-compat at ${config.base_url} (${config.name})`);
      return createOpenAICompatAdapter(config);
    default:
      throw new Error(
        `Unknown model provider: ${String(config.provider)}. Valid providers are: 'anthropic', 'openai-compat'`
      );
  }
}
