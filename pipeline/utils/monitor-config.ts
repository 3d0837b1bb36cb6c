import { z } from "zod";
import { parseHourList } from "./hour-gate.js";
import { errorMessage } from "../../shared/text-utils.js";
import { DEFAULT_TIME_ZONE, DEFAULT_WINDOW_DAYS } from "../services/date-targets.js";

export class MonitorConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid monitor configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "MonitorConfigError";
    this.issues = issues;
  }
}

export interface MonitorConfig {
  telegramBotToken: string;
  telegramChatId: string;
  parkIds: string[];
  windowDays: number;
  timeZone: string;
  summaryHours: number[];
  activeHours: number[];
  baseUrl: string;
  requestTimeoutMs: number;
  requestDelayMs: number;
  debugArtifactDirectory: string | null;
  announceStartup: boolean;
  verbose: boolean;
}

const isValidTimeZone = (value: string): boolean => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
};

const requiredSecret = z.string({ required_error: "required" }).trim().min(1, "required");

const booleanFlag = z
  .string()
  .default("false")
  .transform((value) => ["1", "true", "yes"].includes(value.trim().toLowerCase()));

const hourList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value, context) => {
      try {
        return parseHourList(value);
      } catch (error) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          message: errorMessage(error)
        });
        return z.NEVER;
      }
    });

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: requiredSecret,
  TELEGRAM_CHAT_ID: requiredSecret,
  MONITOR_PARKS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((id) => id.trim())
        .filter(Boolean)
    ),
  MONITOR_WINDOW_DAYS: z.coerce.number().int().min(1).max(14).default(DEFAULT_WINDOW_DAYS),
  MONITOR_TIMEZONE: z
    .string()
    .default(DEFAULT_TIME_ZONE)
    .refine(isValidTimeZone, { message: "not a valid IANA time zone" }),
  MONITOR_SUMMARY_HOURS: hourList("7,12,19"),
  MONITOR_ACTIVE_HOURS: hourList("6-23"),
  MONITOR_BASE_URL: z.string().url().default("https://reserve.bcparks.ca"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(120_000).default(15_000),
  REQUEST_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(1_000),
  DEBUG_ARTIFACT_DIR: z
    .string()
    .optional()
    .transform((value) => value?.trim() ?? null),
  MONITOR_ANNOUNCE_STARTUP: booleanFlag,
  MONITOR_VERBOSE: booleanFlag
});

/**
 * Validates the process environment. Throws MonitorConfigError listing every
 * problem; nothing touches the network before this succeeds.
 */
export const loadMonitorConfig = (
  env: Record<string, string | undefined> = process.env
): MonitorConfig => {
  const normalizedEnv = Object.fromEntries(
    Object.entries(env).map(([key, value]) => [key, value?.trim() === "" ? undefined : value])
  );
  const parsed = envSchema.safeParse(normalizedEnv);

  if (!parsed.success) {
    throw new MonitorConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const data = parsed.data;
  return {
    telegramBotToken: data.TELEGRAM_BOT_TOKEN,
    telegramChatId: data.TELEGRAM_CHAT_ID,
    parkIds: data.MONITOR_PARKS,
    windowDays: data.MONITOR_WINDOW_DAYS,
    timeZone: data.MONITOR_TIMEZONE,
    summaryHours: data.MONITOR_SUMMARY_HOURS,
    activeHours: data.MONITOR_ACTIVE_HOURS,
    baseUrl: data.MONITOR_BASE_URL,
    requestTimeoutMs: data.REQUEST_TIMEOUT_MS,
    requestDelayMs: data.REQUEST_DELAY_MS,
    debugArtifactDirectory: data.DEBUG_ARTIFACT_DIR,
    announceStartup: data.MONITOR_ANNOUNCE_STARTUP,
    verbose: data.MONITOR_VERBOSE
  };
};
