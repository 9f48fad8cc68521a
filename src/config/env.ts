import path from "path";
import dotenv from "dotenv";
import { IANAZone } from "luxon";
import { z } from "zod";
import { AlertClass } from "../types/contracts.js";
import { DEFAULT_ALERT_CLASSES } from "../core/deadlines.js";

/** Loads .env.local, then .env; variables already set are never overridden. */
export function loadDotenv(cwd: string = process.cwd()) {
  dotenv.config({ path: path.resolve(cwd, ".env.local") });
  dotenv.config({ path: path.resolve(cwd, ".env") });
}

const flag = z.enum(["0", "1", "true", "false"]).default("0").transform((v) => v === "1" || v === "true");
const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  PORT: positiveInt.default(7090),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATA_DIR: z.string().default("./data"),
  STORE: z.enum(["file", "sqlite"]).default("file"),
  DB_PATH: z.string().default("./data/workorders.sqlite"),

  TELEGRAM_TOKEN: z.string().optional(),
  TELEGRAM_DRY_RUN: flag,
  TELEGRAM_WEBHOOK_SECRET: z.string().optional(),

  TIMEZONE: z.string().default("America/Sao_Paulo").refine((zone) => IANAZone.isValidZone(zone), "unknown time zone"),
  DEADLINE_SWEEP_INTERVAL_MS: positiveInt.default(60 * 60 * 1000),
  REMINDER_POLL_INTERVAL_MS: positiveInt.default(30_000),
  REMINDER_GRACE_SECONDS: z.coerce.number().int().min(0).default(300),
  ALERT_DUE_TODAY: flag,
  ALERT_CHANNEL: z.string().optional(),

  RATE_LIMIT_WINDOW_MS: positiveInt.default(60_000),
  RATE_LIMIT_MAX: positiveInt.default(60)
});

export type Config = {
  port: number;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  dataDir: string;
  store: "file" | "sqlite";
  dbPath: string;
  telegram: { token?: string; dryRun: boolean; webhookSecret?: string };
  timezone: string;
  deadlineSweepIntervalMs: number;
  reminderPollIntervalMs: number;
  reminderGraceSeconds: number;
  alertClasses: AlertClass[];
  alertChannel?: string;
  rateLimit: { windowMs: number; max: number };
};

/** Parses the environment into a Config. Blank variables count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") present[k] = v.trim();
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    dataDir: e.DATA_DIR,
    store: e.STORE,
    dbPath: e.DB_PATH,
    telegram: { token: e.TELEGRAM_TOKEN, dryRun: e.TELEGRAM_DRY_RUN, webhookSecret: e.TELEGRAM_WEBHOOK_SECRET },
    timezone: e.TIMEZONE,
    deadlineSweepIntervalMs: e.DEADLINE_SWEEP_INTERVAL_MS,
    reminderPollIntervalMs: e.REMINDER_POLL_INTERVAL_MS,
    reminderGraceSeconds: e.REMINDER_GRACE_SECONDS,
    alertClasses: e.ALERT_DUE_TODAY ? [...DEFAULT_ALERT_CLASSES, "dueToday"] : [...DEFAULT_ALERT_CLASSES],
    alertChannel: e.ALERT_CHANNEL,
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX }
  };
}
