// pattern: Functional Core

import type { StateHandlers } from '../types.js';
import { handleCleanup } from './cleanup.js';
import { handleGenerate } from './generate.js';
import { handleIdle } from './idle.js';
import { handleTask } from './task.js';
import { handleUseTools } from './use-tools.js';

export const DEFAULT_HANDLERS: StateHandlers = Object.freeze({
  idle: handleIdle,
  generate: handleGenerate,
  use_tools: handleUseTools,
  task: handleTask,
  cleanup: handleCleanup,
});

export { handleCleanup, handleGenerate, handleIdle, handleTask, handleUseTools };
export { GENERATE_ERROR_TEXT } from './generate.js';
export { REMINDER_FALLBACK_TEXT, buildNotificationPrompt } from './task.js';
