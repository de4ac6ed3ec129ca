// pattern: Imperative Shell

/**
 * Unbounded FIFO between producers and the single consumer.
 * No priorities and no coalescing: events come out in the order they went in.
 */

export type EventQueue<T> = {
  enqueue(event: T): void;
  takeOne(): T | null;
  hasPending(): boolean;
  readonly length: number;
};

export function createEventQueue<T>(): EventQueue<T> {
  const buffer: Array<T> = [];

  return {
    enqueue(event: T): void {
      buffer.push(event);
    },
    takeOne(): T | null {
      return buffer.shift() ?? null;
    },
    hasPending(): boolean {
      return buffer.length > 0;
    },
    get length(): number {
      return buffer.length;
    },
  };
}
