// pattern: Imperative Shell

/**
 * System prompt resolution.
 * An operator-supplied config/system.md wins over the bundled default_system.md;
 * an empty file counts as absent.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DEFAULT_CONFIG_DIR } from '../config/config.js';

export const FALLBACK_SYSTEM_PROMPT = 'You are a helpful AI assistant.';

const PROMPT_FILES = ['system.md', 'default_system.md'] as const;

export function loadSystemPrompt(configDir: string = DEFAULT_CONFIG_DIR): string {
  for (const file of PROMPT_FILES) {
    const path = join(configDir, file);
    if (!existsSync(path)) continue;

    const content = readFileSync(path, 'utf-8').trim();
    if (content) {
      return content;
    }
  }
  return FALLBACK_SYSTEM_PROMPT;
}
