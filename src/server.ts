/**
 * Catalog API Server (Entry Point)
 *
 * Thin shell: context creation, startup and graceful shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import { runtimeConfig } from "./config";
import { createContext } from "./app/context";
import { createApp } from "./app/http";

const ctx = createContext();
const { logger, db } = ctx;

const app = createApp(ctx);

const port = runtimeConfig.port;
const bindHost = process.env.BIND_HOST || "0.0.0.0";
const server = app.listen(port, bindHost, () => {
  logger.info({ port, host: bindHost }, "Catalog API listening");
});

server.on("error", (error) => {
  logger.fatal({ err: error }, "HTTP server failed to start");
  process.exit(1);
});

let shuttingDown = false;

const shutdown = (signal: NodeJS.Signals) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Received termination signal, initiating graceful shutdown");

  server.close(() => {
    logger.info("HTTP server closed");
    db.close();
    logger.info("Database connection closed, graceful shutdown complete");
    process.exit(0);
  });

  // Force exit after timeout (configurable via GRACEFUL_SHUTDOWN_MS)
  setTimeout(() => {
    logger.warn({ timeoutMs: runtimeConfig.gracefulShutdownMs }, "Graceful shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, runtimeConfig.gracefulShutdownMs).unref();
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
