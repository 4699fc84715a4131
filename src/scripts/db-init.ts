import path from "path";
import fs from "fs";
import pino from "pino";
import { loadConfig } from "../config.js";
import { SqliteStore } from "../store/sqlite.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });
const dbPath = path.join(config.dataDir, "conversations.sqlite");

fs.mkdirSync(config.dataDir, { recursive: true });
const store = new SqliteStore(dbPath);

store.init()
  .then(() => store.close())
  .then(() => {
    log.info({ dbPath }, "db initialized");
  })
  .catch((err) => {
    log.error({ err, dbPath }, "db init failed");
    process.exit(1);
  });
