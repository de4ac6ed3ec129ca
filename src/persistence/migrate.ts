// pattern: Imperative Shell

import { fileURLToPath } from "node:url";
import { loadConfig } from "../config/config.js";
import { createLogger } from "../logger.js";
import { createPostgresProvider } from "./postgres.js";

export async function migrate(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger("nudge.migrate", { debug: config.agent.debug });
  const db = createPostgresProvider(config.database);

  try {
    await db.connect();
    logger.info("connected to database");

    const applied = await db.runMigrations();
    logger.info(applied.length > 0 ? `applied ${applied.join(", ")}` : "schema is up to date");
  } finally {
    await db.disconnect();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  migrate().catch((error: unknown) => {
    console.error("Migration failed:", error);
    process.exit(1);
  });
}
