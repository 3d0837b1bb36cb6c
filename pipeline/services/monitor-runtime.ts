import { AvailabilityMonitor } from "./availability-monitor.js";
import { buildDateWindow, selectParks } from "./date-targets.js";
import { formatStartupMessage } from "./notification-messages.js";
import { PageFetcher } from "./page-fetcher.js";
import { TelegramNotifier } from "./telegram-notifier.js";
import { DEFAULT_PARK_DEFINITIONS } from "../constants/parks.js";
import { DebugArtifactWriter } from "../utils/debug-artifacts.js";
import { createHourGate } from "../utils/hour-gate.js";
import { createConsoleLogger, type MonitorLogger } from "../utils/logger.js";
import { MonitorConfigError, type MonitorConfig } from "../utils/monitor-config.js";
import { errorMessage } from "../../shared/text-utils.js";
import type { DateTarget, ParkDefinition, RunResult } from "../../shared/contracts.js";

interface MonitorRuntimeOverrides {
  fetchImpl?: typeof fetch;
  logger?: MonitorLogger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  parkRegistry?: readonly ParkDefinition[];
}

export interface MonitorRuntime {
  config: MonitorConfig;
  logger: MonitorLogger;
  parks: ParkDefinition[];
  window: DateTarget[];
  notifier: TelegramNotifier;
  monitor: AvailabilityMonitor;
}

/**
 * Wires the execution context (logger, HTTP client, notifier, gates) from a
 * validated config. Performs no network I/O.
 */
export const createMonitorRuntime = (
  config: MonitorConfig,
  overrides?: MonitorRuntimeOverrides
): MonitorRuntime => {
  const logger = overrides?.logger ?? createConsoleLogger({ verbose: config.verbose });
  const now = overrides?.now ?? (() => new Date());

  let parks: ParkDefinition[];
  try {
    parks = selectParks(overrides?.parkRegistry ?? DEFAULT_PARK_DEFINITIONS, config.parkIds);
  } catch (error) {
    throw new MonitorConfigError([`MONITOR_PARKS: ${errorMessage(error)}`]);
  }

  const window = buildDateWindow(now(), { timeZone: config.timeZone, days: config.windowDays });

  const notifier = new TelegramNotifier({
    botToken: config.telegramBotToken,
    chatId: config.telegramChatId,
    fetchImpl: overrides?.fetchImpl,
    logger
  });

  const monitor = new AvailabilityMonitor({
    baseUrl: config.baseUrl,
    timeZone: config.timeZone,
    requestDelayMs: config.requestDelayMs,
    fetcher: new PageFetcher({
      timeoutMs: config.requestTimeoutMs,
      fetchImpl: overrides?.fetchImpl,
      logger
    }),
    notifier,
    logger,
    debugArtifacts: config.debugArtifactDirectory
      ? new DebugArtifactWriter({ directory: config.debugArtifactDirectory, logger, now })
      : null,
    summaryGate: createHourGate(config.summaryHours, config.timeZone),
    activeGate: createHourGate(config.activeHours, config.timeZone),
    now,
    sleep: overrides?.sleep
  });

  return { config, logger, parks, window, notifier, monitor };
};

export const runMonitorOnce = async (runtime: MonitorRuntime): Promise<RunResult | null> => {
  const { config, logger, parks, window, notifier, monitor } = runtime;

  logger.info(`Parks: ${parks.map((park) => park.name).join(", ")}`);
  logger.info(`Dates: ${window.map((date) => `${date.label} (${date.isoDate})`).join(", ")}`);

  if (config.announceStartup) {
    const username = await notifier.verifyConnection();
    if (username) {
      await notifier.notify(formatStartupMessage(parks, window));
    }
  }

  return monitor.run(parks, window);
};
