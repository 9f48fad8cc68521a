import fs from "fs";
import path from "path";

import { loadDotenv, loadConfig } from "./config/env.js";
loadDotenv();

import express from "express";
import pino from "pino";

import { makeRoutes } from "./api/routes.js";
import { makeTelegramRoutes } from "./api/telegram.js";
import { Store } from "./store/store.js";
import { FileStore } from "./store/file.js";
import { SqliteStore } from "./store/sqlite.js";
import { createRepository } from "./store/repository.js";
import { createReminderScheduler } from "./core/reminders.js";
import { createDeadlineMonitor } from "./core/deadlines.js";
import { createWorkflow } from "./core/workflow.js";
import { LabeledTextExtractor } from "./lib/extract.js";
import { TelegramTransport } from "./lib/telegram.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

function makeStore(): Store {
  if (config.store === "sqlite") {
    fs.mkdirSync(path.dirname(path.resolve(config.dbPath)), { recursive: true });
    return new SqliteStore(path.resolve(config.dbPath), log);
  }
  fs.mkdirSync(config.dataDir, { recursive: true });
  return new FileStore(path.resolve(config.dataDir));
}

async function main() {
  const store = makeStore();
  await store.init();

  const telegram = new TelegramTransport({ token: config.telegram.token, dryRun: config.telegram.dryRun, logger: log });
  const repository = createRepository({ store, logger: log });
  const scheduler = createReminderScheduler({
    store,
    notifier: telegram,
    repository,
    graceSeconds: config.reminderGraceSeconds,
    pollIntervalMs: config.reminderPollIntervalMs,
    logger: log
  });
  const monitor = createDeadlineMonitor({
    repository,
    marks: store,
    notifier: telegram,
    timezone: config.timezone,
    alertClasses: config.alertClasses,
    fallbackChannel: config.alertChannel,
    intervalMs: config.deadlineSweepIntervalMs,
    logger: log
  });
  const workflow = createWorkflow({
    repository,
    scheduler,
    transport: telegram,
    extractor: new LabeledTextExtractor(),
    timezone: config.timezone,
    logger: log
  });

  const app = express();
  app.use(express.json({ limit: "512kb" }));

  app.use("/api", makeRoutes({ repository, scheduler, rateLimit: config.rateLimit, logger: log }));
  app.use("/api/telegram", makeTelegramRoutes({
    workflow,
    telegram,
    webhookSecret: config.telegram.webhookSecret,
    logger: log
  }));

  scheduler.start();
  monitor.start();

  const server = app.listen(config.port, () => {
    log.info(
      {
        PORT: config.port,
        STORE: config.store,
        TIMEZONE: config.timezone,
        ALERT_CLASSES: config.alertClasses,
        TELEGRAM_CONFIGURED: telegram.isConfigured(),
        TELEGRAM_DRY_RUN: config.telegram.dryRun
      },
      "Work-order desk running"
    );
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    scheduler.stop();
    monitor.stop();
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (err) => {
          log.error({ err }, "store close failed");
          process.exit(1);
        }
      );
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
