import { parsePage, classifyAvailability } from "./availability-classifier.js";
import { buildCheckUnits, DEFAULT_TIME_ZONE } from "./date-targets.js";
import {
  formatAvailabilityAlert,
  formatMonitorError,
  formatRunSummary
} from "./notification-messages.js";
import type { PageFetcher } from "./page-fetcher.js";
import type { Notifier } from "./telegram-notifier.js";
import type { DebugArtifactWriter } from "../utils/debug-artifacts.js";
import { alwaysOpen, type HourGate } from "../utils/hour-gate.js";
import { silentLogger, type MonitorLogger } from "../utils/logger.js";
import { errorMessage } from "../../shared/text-utils.js";
import type {
  CheckUnit,
  DateTarget,
  ParkDefinition,
  RunResult,
  UnitResult
} from "../../shared/contracts.js";

interface AvailabilityMonitorOptions {
  baseUrl: string;
  timeZone: string;
  requestDelayMs: number;
}

export interface AvailabilityMonitorContext extends Partial<AvailabilityMonitorOptions> {
  fetcher: Pick<PageFetcher, "fetchPage">;
  notifier: Notifier;
  logger?: MonitorLogger;
  debugArtifacts?: Pick<DebugArtifactWriter, "write"> | null;
  /** Whether an end-of-run summary may be sent at this time. */
  summaryGate?: HourGate;
  /** Whether an error report may be sent at this time. */
  activeGate?: HourGate;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: AvailabilityMonitorOptions = {
  baseUrl: "https://reserve.bcparks.ca",
  timeZone: DEFAULT_TIME_ZONE,
  requestDelayMs: 1_000
};

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

const RULE = "=".repeat(70);

export class AvailabilityMonitor {
  private readonly options: AvailabilityMonitorOptions;

  private readonly context: AvailabilityMonitorContext;

  private readonly logger: MonitorLogger;

  private readonly summaryGate: HourGate;

  private readonly activeGate: HourGate;

  private readonly now: () => Date;

  private readonly sleep: (ms: number) => Promise<void>;

  private requestCount = 0;

  constructor(context: AvailabilityMonitorContext) {
    this.options = {
      baseUrl: context.baseUrl ?? DEFAULT_OPTIONS.baseUrl,
      timeZone: context.timeZone ?? DEFAULT_OPTIONS.timeZone,
      requestDelayMs: context.requestDelayMs ?? DEFAULT_OPTIONS.requestDelayMs
    };
    this.context = context;
    this.logger = context.logger ?? silentLogger;
    this.summaryGate = context.summaryGate ?? alwaysOpen;
    this.activeGate = context.activeGate ?? alwaysOpen;
    this.now = context.now ?? (() => new Date());
    this.sleep = context.sleep ?? defaultSleep;
  }

  /** Fixed pacing between consecutive requests; the first request of a run is not delayed. */
  private async pace(): Promise<void> {
    if (this.requestCount > 0 && this.options.requestDelayMs > 0) {
      await this.sleep(this.options.requestDelayMs);
    }
    this.requestCount += 1;
  }

  private async notifyAvailability(
    unit: CheckUnit,
    sourceUrl: string,
    evidence: NonNullable<UnitResult["evidence"]>
  ): Promise<void> {
    const message = formatAvailabilityAlert({
      park: unit.park,
      date: unit.date,
      sourceUrl,
      evidence,
      foundAt: this.now(),
      timeZone: this.options.timeZone
    });
    await this.context.notifier.notify(message);
  }

  /**
   * Tries candidate URLs in order and stops at the first AVAILABLE page.
   * An error on one URL is logged and the next URL is tried; a unit whose
   * URLs all fail is recorded as not available.
   */
  async checkUnit(unit: CheckUnit): Promise<UnitResult> {
    const result: UnitResult = {
      unitId: unit.id,
      parkId: unit.park.id,
      parkName: unit.park.name,
      date: unit.date,
      available: false,
      verdict: null,
      evidence: null,
      sourceUrl: null,
      attemptedUrls: 0,
      failedUrls: 0
    };

    this.logger.info(
      `\n📅 ${unit.park.name} / ${unit.date.label.toUpperCase()}: ${unit.date.displayDate} (${unit.date.dayName})`
    );
    this.logger.info("-".repeat(70));

    const total = unit.candidateUrls.length;
    for (const [index, url] of unit.candidateUrls.entries()) {
      await this.pace();
      result.attemptedUrls += 1;
      this.logger.info(`🔍 [${index + 1}/${total}] ${url}`);

      try {
        const page = await this.context.fetcher.fetchPage(url);
        if (!page.ok) {
          result.failedUrls += 1;
          this.logger.warn(`⚠️ ${page.reason} (${url})`);
          continue;
        }

        this.logger.info(`✅ Loaded (${page.html.length} chars)`);
        const { pageText, document } = parsePage(page.html);

        if (this.context.debugArtifacts) {
          await this.context.debugArtifacts.write({
            unit,
            attempt: index + 1,
            sourceUrl: url,
            html: page.html,
            pageText
          });
        }

        const classification = classifyAvailability({
          pageText,
          parkKeywords: unit.park.keywords,
          document,
          targetDate: unit.date
        });
        const { evidence } = classification;

        result.verdict = classification.verdict;
        result.evidence = evidence;
        this.logger.debug(
          `Verdict ${classification.verdict}; keywords=${JSON.stringify(evidence.matchedKeywords)} ` +
          `available=${JSON.stringify(evidence.availabilityPhrases)} ` +
          `unavailable=${JSON.stringify(evidence.unavailabilityPhrases)} ` +
          `controls=${evidence.hasBookingControls} targetDate=${evidence.mentionsTargetDate}`
        );

        if (classification.verdict === "AVAILABLE") {
          this.logger.info(`🎉 AVAILABILITY DETECTED: ${unit.park.name} ${unit.date.label}`);
          result.available = true;
          result.sourceUrl = url;
          await this.notifyAvailability(unit, url, evidence);
          break;
        }
      } catch (error) {
        result.failedUrls += 1;
        this.logger.warn(`⚠️ Check failed: ${errorMessage(error)} (${url})`);
        if (result.available) {
          break;
        }
      }
    }

    const outcome = result.available ? "✅ AVAILABLE" : "❌ NOT AVAILABLE";
    this.logger.info(`${outcome}: ${unit.park.name} ${unit.date.label}`);

    return result;
  }

  private logFinalResults(units: readonly UnitResult[]): void {
    this.logger.info("\n📊 FINAL RESULTS:");
    this.logger.info("=".repeat(50));
    for (const unit of units) {
      const status = unit.available ? "✅ AVAILABLE" : "❌ NOT AVAILABLE";
      this.logger.info(`${status}: ${unit.parkName} - ${unit.date.label} - ${unit.date.displayDate}`);
    }
    const availableCount = units.filter((unit) => unit.available).length;
    this.logger.info(`\n🎯 SUMMARY: ${availableCount}/${units.length} checks have availability`);
  }

  /**
   * Sends the end-of-run summary only when nothing was found and the summary
   * gate is open. Found units have already produced their own alerts.
   */
  private async maybeSendSummary(units: readonly UnitResult[], checkedAt: Date): Promise<boolean> {
    if (units.some((unit) => unit.available)) {
      return false;
    }

    if (!this.summaryGate(checkedAt)) {
      this.logger.debug("Summary suppressed outside summary hours");
      return false;
    }

    return this.context.notifier.notify(formatRunSummary(units, checkedAt, this.options.timeZone));
  }

  async runCheck(
    parks: readonly ParkDefinition[],
    window: readonly DateTarget[]
  ): Promise<RunResult> {
    const startedAt = this.now();
    this.requestCount = 0;

    const units = buildCheckUnits(parks, window, this.options.baseUrl);
    const results: UnitResult[] = [];
    for (const unit of units) {
      results.push(await this.checkUnit(unit));
    }

    this.logFinalResults(results);
    const finishedAt = this.now();
    const summarySent = await this.maybeSendSummary(results, finishedAt);

    return {
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      units: results,
      availableCount: results.filter((unit) => unit.available).length,
      summarySent
    };
  }

  /**
   * One full run. Unexpected failures are logged and, inside active hours,
   * reported once to the operator; this never rejects.
   */
  async run(
    parks: readonly ParkDefinition[],
    window: readonly DateTarget[]
  ): Promise<RunResult | null> {
    const startedAt = this.now();
    this.logger.info(RULE);
    this.logger.info(`🚀 DAY-USE PASS CHECK: ${parks.length} park(s) × ${window.length} day(s)`);
    this.logger.info(RULE);

    let result: RunResult | null = null;
    try {
      result = await this.runCheck(parks, window);
    } catch (error) {
      this.logger.error(`❌ Availability check failed: ${errorMessage(error)}`);

      const failedAt = this.now();
      if (this.activeGate(failedAt)) {
        await this.context.notifier.notify(
          formatMonitorError(error, failedAt, this.options.timeZone)
        );
      }
    }

    const durationSeconds = (this.now().getTime() - startedAt.getTime()) / 1000;
    this.logger.info(`\n⏱️ Total check time: ${durationSeconds.toFixed(2)} seconds`);
    this.logger.info(RULE);
    this.logger.info("✅ CHECK COMPLETED");
    this.logger.info(RULE);

    return result;
  }
}
