// pattern: Functional Core

export type { EventConsumer } from './consumer.js';
export { createEventConsumer } from './consumer.js';
