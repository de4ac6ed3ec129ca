// pattern: Imperative Shell

/**
 * Interactive terminal channel.
 * Reads user lines through readline and writes the agent's output around the
 * input prompt: anything printed while the prompt is showing first breaks the
 * prompt line and redraws the prompt afterwards.
 */

import * as readline from 'node:readline';
import type { Logger } from '../logger.js';
import { BUSY_MESSAGE } from './types.js';
import type { OutputSink } from './types.js';

const EXIT_COMMANDS = new Set(['exit', 'quit']);

export type TerminalChannelOptions = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  onMessage: (text: string) => void;
  /** Called once when the user asks to leave: exit/quit, end of input or Ctrl+C. */
  onExit: () => void;
  isBusy: () => boolean;
  logger: Logger;
  prompt?: string;
};

export type TerminalChannel = OutputSink & {
  start(): void;
  close(): void;
};

export function createTerminalChannel(options: TerminalChannelOptions): TerminalChannel {
  const { output, logger } = options;
  let rl: readline.Interface | null = null;
  let promptVisible = false;
  let streamOpen = false;
  let exitRequested = false;

  function renderPrompt(): void {
    if (rl && promptVisible) {
      rl.prompt(true);
    }
  }

  function showPrompt(): void {
    if (!rl) return;
    promptVisible = true;
    rl.prompt();
  }

  function emitLine(text: string): void {
    if (!text) return;
    if (promptVisible) {
      output.write('\n');
    }
    output.write(`${text}\n`);
    renderPrompt();
  }

  function requestExit(): void {
    if (exitRequested) return;
    exitRequested = true;
    promptVisible = false;
    options.onExit();
  }

  function handleLine(line: string): void {
    promptVisible = false;
    const text = line.trim();

    if (!text) {
      showPrompt();
      return;
    }

    if (EXIT_COMMANDS.has(text.toLowerCase())) {
      logger.info('user requested exit');
      requestExit();
      return;
    }

    if (options.isBusy()) {
      output.write(`${BUSY_MESSAGE}\n`);
    }
    options.onMessage(text);
    showPrompt();
  }

  return {
    emitText: emitLine,
    emitStatus: emitLine,

    beginStream(): void {
      if (promptVisible) {
        output.write('\n');
      }
      streamOpen = true;
    },

    emitStreamChunk(chunk: string): void {
      if (chunk) {
        output.write(chunk);
      }
    },

    endStream(): void {
      if (!streamOpen) return;
      streamOpen = false;
      output.write('\n');
      renderPrompt();
    },

    start(): void {
      if (rl) return;
      rl = readline.createInterface({ input: options.input, output, prompt: options.prompt ?? '> ' });
      rl.on('line', handleLine);
      rl.on('SIGINT', requestExit);
      rl.on('close', () => {
        rl = null;
        requestExit();
      });
      showPrompt();
      logger.debug('terminal channel started');
    },

    close(): void {
      exitRequested = true;
      promptVisible = false;
      rl?.close();
    },
  };
}
