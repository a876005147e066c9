import path from "path";
import dotenv from "dotenv";
import cron from "node-cron";
import { z } from "zod";
import { ConfigError } from "./errors";

dotenv.config();

const DEFAULT_SEARCH_URL = "https://apps.mcso.us/PAID/Home/SearchResults";
const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : undefined;
  });

const envSchema = z.object({
  WATCH_NAMES: z.string().default(""),
  WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
  POLL_INTERVAL_MINUTES: z.coerce.number().int().min(1).default(15),
  CRON_PATTERN: optionalString,
  DATA_FILE: optionalString,
  SEARCH_URL: optionalString.pipe(z.string().url().optional()),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).max(600_000).default(60_000),
  USER_AGENT: optionalString,
  ERROR_REPORT_INTERVAL_HOURS: z.coerce.number().positive().max(168).default(4),
  TZ: optionalString,
});

export type NotifierConfig =
  | { kind: "webhook"; url: string }
  | { kind: "telegram"; botToken: string; chatId: string }
  | { kind: "log" };

export interface AppConfig {
  watchNames: string[];
  notifier: NotifierConfig;
  pollIntervalMinutes: number;
  /** Explicit cron schedule; without one cycles run every pollIntervalMinutes */
  cronPattern: string | null;
  storagePath: string;
  searchUrl: string;
  requestTimeoutMs: number;
  userAgent: string;
  errorReportIntervalHours: number;
  timezone: string;
}

export function parseWatchNames(raw: string): string[] {
  return raw
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function resolveNotifier(
  webhookUrl: string | undefined,
  botToken: string | undefined,
  chatId: string | undefined
): NotifierConfig {
  if (webhookUrl) {
    return { kind: "webhook", url: webhookUrl };
  }
  if (botToken && chatId) {
    return { kind: "telegram", botToken, chatId };
  }
  if (botToken || chatId) {
    throw new ConfigError("TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together");
  }
  return { kind: "log" };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join(".") || "environment";
    throw new ConfigError(`Invalid ${where}: ${issue?.message ?? "unknown error"}`);
  }
  const parsed = result.data;

  const watchNames = parseWatchNames(parsed.WATCH_NAMES);
  if (watchNames.length === 0) {
    throw new ConfigError("No names configured to watch. Set WATCH_NAMES in .env");
  }

  const cronPattern = parsed.CRON_PATTERN ?? null;
  if (cronPattern !== null && !cron.validate(cronPattern)) {
    throw new ConfigError(`Invalid CRON_PATTERN: "${cronPattern}"`);
  }

  return {
    watchNames,
    notifier: resolveNotifier(parsed.WEBHOOK_URL, parsed.TELEGRAM_BOT_TOKEN, parsed.TELEGRAM_CHAT_ID),
    pollIntervalMinutes: parsed.POLL_INTERVAL_MINUTES,
    cronPattern,
    storagePath: path.resolve(parsed.DATA_FILE ?? path.join("data", "seen_bookings.json")),
    searchUrl: parsed.SEARCH_URL ?? DEFAULT_SEARCH_URL,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    userAgent: parsed.USER_AGENT ?? DEFAULT_USER_AGENT,
    errorReportIntervalHours: parsed.ERROR_REPORT_INTERVAL_HOURS,
    timezone: parsed.TZ ?? "UTC",
  };
}
