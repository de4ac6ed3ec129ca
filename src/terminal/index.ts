// pattern: Functional Core

export type { OutputSink } from './types.js';
export { BUSY_MESSAGE } from './types.js';
export type { TerminalChannel, TerminalChannelOptions } from './channel.js';
export { createTerminalChannel } from './channel.js';
