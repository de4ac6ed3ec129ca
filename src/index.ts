#!/usr/bin/env node
// pattern: Imperative Shell

/**
 * nudge entry point.
 * Composition root that wires config, the model backend, the reminder store and
 * the agent, then runs the terminal channel and the reminder poller as the two
 * producers feeding one event consumer.
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { loadConfig } from './config/config.js';
import type { AppConfig } from './config/config.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { createPostgresProvider } from './persistence/postgres.js';
import type { PersistenceProvider } from './persistence/types.js';
import { createModelProvider } from './model/factory.js';
import type { ModelProvider } from './model/types.js';
import { createToolbox } from './tool/registry.js';
import type { Toolbox } from './tool/types.js';
import { createDatetimeTool } from './tool/builtin/datetime.js';
import { createReminderTools } from './tool/builtin/reminders.js';
import { createPostgresReminderStore } from './reminders/postgres-store.js';
import type { ReminderStore } from './reminders/store.js';
import { createReminderPoller } from './reminders/poller.js';
import { createAgent } from './agent/agent.js';
import { loadSystemPrompt } from './agent/context.js';
import { reminderDueEvent, userMessageEvent } from './agent/events.js';
import type { Agent, AgentConfig } from './agent/types.js';
import { createEventConsumer } from './runtime/consumer.js';
import type { EventConsumer } from './runtime/consumer.js';
import { createTerminalChannel } from './terminal/channel.js';

export function buildAgentConfig(config: AppConfig): AgentConfig {
  return {
    model_name: config.model.name,
    max_tokens: config.model.max_tokens,
    stream: config.model.stream,
    think: config.model.think,
    max_internal_steps: config.agent.max_internal_steps,
    max_history_messages: config.agent.max_history_messages,
  };
}

export type BuiltinToolDeps = {
  store: ReminderStore;
  model: ModelProvider;
  modelName: string;
  logger: Logger;
  now?: () => Date;
};

export function createAppToolbox(deps: BuiltinToolDeps): Toolbox {
  const toolbox = createToolbox(deps.logger.child('toolbox'));
  toolbox.register(createDatetimeTool(deps.now));
  for (const tool of createReminderTools({ ...deps, logger: deps.logger.child('reminders') })) {
    toolbox.register(tool);
  }
  return toolbox;
}

type ShutdownDeps = {
  channel: { close(): void };
  poller: { stop(): Promise<void> };
  consumer: EventConsumer;
  agent: Agent;
  persistence: PersistenceProvider;
  logger: Logger;
};

/**
 * Stop producers, let the in-flight run finish, handle what is already queued
 * once, then release the database. Calling it again returns the same promise.
 */
export function createShutdownHandler(deps: ShutdownDeps): () => Promise<void> {
  let shutdown: Promise<void> | null = null;

  async function run(): Promise<void> {
    deps.logger.info('shutting down');
    deps.channel.close();
    await deps.poller.stop();
    await deps.consumer.settle();

    const remaining = await deps.agent.processQueuedEvents();
    if (remaining > 0) {
      deps.logger.info(`processed ${remaining} queued event(s) before exit`);
    }

    await deps.persistence.disconnect();
  }

  return () => {
    if (!shutdown) {
      shutdown = run();
    }
    return shutdown;
  };
}

export async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger('nudge', { debug: config.agent.debug });

  logger.info(
    `model ${config.model.name} via ${config.model.provider}, streaming ${config.model.stream ? 'on' : 'off'}, debug ${config.agent.debug ? 'on' : 'off'}`,
  );

  const persistence = createPostgresProvider(config.database);
  await persistence.connect();
  const applied = await persistence.runMigrations();
  if (applied.length > 0) {
    logger.info(`applied migrations: ${applied.join(', ')}`);
  }

  const model = createModelProvider(config.model, logger.child('model'));
  const store = createPostgresReminderStore(persistence);
  const agentConfig = buildAgentConfig(config);

  let consumer: EventConsumer | null = null;

  const channel = createTerminalChannel({
    input: process.stdin,
    output: process.stdout,
    onMessage: (text) => consumer?.submit(userMessageEvent(text)),
    onExit: () => {
      shutdownAndExit().catch((error: unknown) => {
        logger.error('shutdown failed', error);
        process.exit(1);
      });
    },
    isBusy: () => consumer?.isBusy() ?? false,
    logger: logger.child('terminal'),
  });

  const agent = createAgent({
    model,
    toolbox: createAppToolbox({ store, model, modelName: agentConfig.model_name, logger }),
    output: channel,
    config: agentConfig,
    systemPrompt: loadSystemPrompt(),
    logger: logger.child('agent'),
  });
  consumer = createEventConsumer(agent, logger.child('consumer'));
  const eventConsumer = consumer;

  const poller = createReminderPoller({
    store,
    onDue: (reminder) => eventConsumer.submit(reminderDueEvent(reminder)),
    intervalSeconds: config.agent.reminder_poll_seconds,
    logger: logger.child('reminders'),
  });

  const shutdown = createShutdownHandler({
    channel,
    poller,
    consumer: eventConsumer,
    agent,
    persistence,
    logger,
  });

  async function shutdownAndExit(): Promise<void> {
    await shutdown();
    process.exit(0);
  }

  const onSignal = (): void => {
    shutdownAndExit().catch((error: unknown) => {
      logger.error('shutdown failed', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  console.log('Type your message (exit or quit to leave):\n');
  channel.start();
  poller.start();
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
