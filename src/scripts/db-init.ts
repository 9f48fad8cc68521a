import fs from "fs";
import path from "path";
import pino from "pino";
import { loadConfig, loadDotenv } from "../config/env.js";
import { SqliteStore } from "../store/sqlite.js";

loadDotenv();
const config = loadConfig();
const log = pino({ level: config.logLevel });
fs.mkdirSync(path.dirname(path.resolve(config.dbPath)), { recursive: true });
const store = new SqliteStore(config.dbPath, log);

store.init()
  .then(() => store.close())
  .then(() => {
    log.info({ DB_PATH: config.dbPath }, "db initialized");
  })
  .catch((err) => {
    log.error({ err, DB_PATH: config.dbPath }, "db init failed");
    process.exit(1);
  });
