/**
 * @meridian/node — Entry point.
 *
 * Loads config, builds the engine over in-memory or JSONL storage,
 * starts the HTTP server, and handles graceful shutdown.
 */

import { join } from "node:path";
import { serve } from "@hono/node-server";
import pino from "pino";
import { CoordinationEngine, SystemClock } from "@meridian/coordinator";
import type { RecordStore, SignalJournal } from "@meridian/store";
import {
  InMemoryRecordStore,
  InMemorySignalJournal,
  JsonlRecordStore,
  JsonlSignalJournal,
} from "@meridian/store";
import type { Address } from "@meridian/types";
import { loadConfig, parseApiKeys, toEngineConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createApp } from "./app.js";
import { logSignal } from "./signal-log.js";

function openStorage(config: AppConfig): { store: RecordStore; journal: SignalJournal } {
  if (config.DATA_DIR === undefined) {
    return { store: new InMemoryRecordStore(), journal: new InMemorySignalJournal() };
  }
  return {
    store: new JsonlRecordStore({ filePath: join(config.DATA_DIR, "records.jsonl") }),
    journal: new JsonlSignalJournal({ filePath: join(config.DATA_DIR, "signals.jsonl") }),
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { store, journal } = openStorage(config);

  // Heights count from the first journaled signal so they survive restarts
  const firstSignal = journal.readAll({ maxCount: 1 })[0];
  const clock = new SystemClock({
    genesisTime:
      config.GENESIS_TIME ??
      firstSignal?.signal.metadata.time ??
      Math.floor(Date.now() / 1000),
    heightIntervalSeconds: config.HEIGHT_INTERVAL_SECONDS,
  });

  const subscription = journal.subscribe((stored) => logSignal(logger, stored));

  const engine = new CoordinationEngine({
    owner: config.OWNER_ADDRESS,
    clock,
    store,
    journal,
    config: toEngineConfig(config),
  });

  const integrity = journal.verifyIntegrity();
  if (!integrity.valid) {
    logger.error({ errors: integrity.errors }, "Signal journal failed integrity check");
  }

  const parsedKeys = parseApiKeys(config.API_KEYS);
  const apiKeys = new Map<string, Address>(parsedKeys.map((k) => [k.key, k.caller]));
  if (parsedKeys.length > 0) {
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; callers identify themselves with X-Caller");
  }

  const { app } = createApp({
    engine,
    auth: { apiKeys },
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err) => {
      logger.error({ err }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      owner: engine.owner(),
      journalPosition: journal.position(),
      persistent: config.DATA_DIR !== undefined,
    },
    "Coordination node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    subscription.unsubscribe();
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
