/**
 * Express Server Entry Point
 *
 * Settings are parsed and the task runtime is built before the server accepts
 * requests; SIGINT/SIGTERM close the listener and drain the worker.
 */

import "dotenv/config";
import type { Server } from "node:http";
import { createApp } from "./app";
import { ConfigError, loadSettings } from "~/lib/config/settings";
import { getLogger, setLogLevel } from "~/lib/log/logger";
import { initializeTaskRuntime } from "~/lib/task-queue/startup";
import type { TaskRuntime } from "~/lib/task-queue/startup";

const log = getLogger({ module: "Server" });

const SHUTDOWN_TIMEOUT_MS = 5000;

let shuttingDown = false;

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

/**
 * Graceful shutdown handler
 */
async function shutdown(signal: string, server: Server, runtime: TaskRuntime) {
  if (shuttingDown) return;
  shuttingDown = true;

  log.info({ signal }, "shutdown initiated");

  try {
    await closeServer(server);
    await runtime.shutdown({ reason: "server-shutdown", timeoutMs: SHUTDOWN_TIMEOUT_MS });

    log.info({}, "shutdown complete");
    process.exit(0);
  } catch (error) {
    log.error({ err: error }, "error during shutdown");
    process.exit(1);
  }
}

/**
 * Main entry point
 */
async function main() {
  log.info({}, "starting application initialization");

  const settings = loadSettings();
  setLogLevel(settings.logLevel);
  log.info({ level: settings.logLevel, env: settings.env }, "settings loaded");

  const runtime = initializeTaskRuntime(settings);
  runtime.start();

  const app = createApp(runtime, settings);

  const server = app.listen(settings.port, settings.host, () => {
    log.info({ host: settings.host, port: settings.port }, "server listening");
  });

  process.on("SIGINT", () => void shutdown("SIGINT", server, runtime));
  process.on("SIGTERM", () => void shutdown("SIGTERM", server, runtime));

  process.on("uncaughtException", (error) => {
    log.error({ err: error }, "uncaught exception");
    void shutdown("uncaughtException", server, runtime);
  });

  process.on("unhandledRejection", (reason) => {
    log.error({ err: reason }, "unhandled rejection");
  });

  return server;
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error("Failed to start server:", error);
  }
  process.exit(1);
});
