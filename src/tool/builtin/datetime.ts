// pattern: Imperative Shell

import { toLocalIsoString } from '../../reminders/datetime.js';
import type { Tool } from '../types.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function createDatetimeTool(now: () => Date = () => new Date()): Tool {
  return {
    definition: {
      name: 'datetime',
      description:
        'Get the current local date and time. Use this for any question about the current time or date instead of guessing.',
      parameters: [],
    },
    user_message: 'Checking current date and time...',
    handler: async () => {
      const current = now();
      return {
        iso: toLocalIsoString(current),
        date: `${current.getFullYear()}-${pad(current.getMonth() + 1)}-${pad(current.getDate())}`,
        time: `${pad(current.getHours())}:${pad(current.getMinutes())}:${pad(current.getSeconds())}`,
        timestamp: current.getTime() / 1000,
        timezone: Intl.DateTimeFormat().resolvedOptions().timeZone,
      };
    },
  };
}
