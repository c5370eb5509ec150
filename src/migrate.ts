/**
 * Standalone migration runner: `npm run migrate`.
 * The server applies the same migrations on startup.
 */

import pino from "pino";
import { runtimeConfig } from "./config";
import { openDatabase } from "./db/connection";
import { applyMigrations } from "./db/migrator";

const logger = pino({ level: runtimeConfig.logLevel });
const db = openDatabase(runtimeConfig.sqlitePath);

try {
  const applied = applyMigrations(db, logger);
  logger.info({ applied: applied.length, sqlitePath: runtimeConfig.sqlitePath }, "Migrations applied.");
} finally {
  db.close();
}
