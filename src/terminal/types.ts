// pattern: Functional Core

/**
 * Where the agent's user-visible output goes.
 * A stream section is opened with `beginStream`, filled with chunks and always
 * closed with `endStream`; the other calls print a whole line at once.
 */
export interface OutputSink {
  emitText(text: string): void;
  emitStatus(text: string): void;
  beginStream(): void;
  emitStreamChunk(chunk: string): void;
  endStream(): void;
}

export const BUSY_MESSAGE = "I'm focusing on another task right now. I will get back to you ASAP!";
