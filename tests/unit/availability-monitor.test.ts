import { describe, expect, it, vi } from "vitest";
import { AvailabilityMonitor } from "../../pipeline/services/availability-monitor.js";
import { buildDateTarget } from "../../pipeline/services/date-targets.js";
import type { FetchPageResult } from "../../pipeline/services/page-fetcher.js";
import { DEFAULT_PARK_DEFINITIONS } from "../../pipeline/constants/parks.js";

const BASE_URL = "https://reserve.example.test";
const NOW = new Date("2026-10-19T19:00:00Z");
const [joffre, garibaldi] = DEFAULT_PARK_DEFINITIONS;
const today = buildDateTarget({ year: 2026, month: 10, day: 19 }, 0);
const tomorrow = buildDateTarget({ year: 2026, month: 10, day: 19 }, 1);

const page = (url: string, html: string): FetchPageResult => ({
  ok: true,
  url,
  finalUrl: url,
  status: 200,
  html
});

const failure = (url: string): FetchPageResult => ({
  ok: false,
  url,
  status: 503,
  reason: "HTTP 503"
});

const createHarness = (
  respond: (url: string) => FetchPageResult,
  options?: {
    summaryOpen?: boolean;
    activeOpen?: boolean;
    deliver?: (message: string) => Promise<boolean>;
  }
) => {
  const fetchPage = vi.fn(async (url: string) => respond(url));
  const notify = vi.fn(options?.deliver ?? (async (_message: string) => true));
  const sleep = vi.fn(async (_ms: number) => {});
  const write = vi.fn(async () => null);

  const monitor = new AvailabilityMonitor({
    baseUrl: BASE_URL,
    requestDelayMs: 1_000,
    fetcher: { fetchPage },
    notifier: { notify },
    debugArtifacts: { write },
    summaryGate: () => options?.summaryOpen ?? true,
    activeGate: () => options?.activeOpen ?? true,
    now: () => NOW,
    sleep
  });

  return { monitor, fetchPage, notify, sleep, write };
};

describe("AvailabilityMonitor", () => {
  it("stops at the first AVAILABLE page and sends a single alert", async () => {
    const { monitor, fetchPage, notify, sleep, write } = createHarness((url) =>
      url.includes("/dayuse/registration?facility=")
        ? page(url, "<h1>Joffre Lakes</h1><p>Book now</p>")
        : failure(url)
    );

    const result = await monitor.runCheck([joffre], [today]);

    const expectedUrl = `${BASE_URL}/dayuse/registration?facility=joffre-lakes-provincial-park&date=2026-10-19`;
    expect(fetchPage.mock.calls.map(([url]) => url)).toEqual([
      `${BASE_URL}/facility/joffre-lakes-provincial-park`,
      expectedUrl
    ]);
    expect(result.units[0]).toMatchObject({
      unitId: "joffre-lakes:2026-10-19",
      available: true,
      verdict: "AVAILABLE",
      sourceUrl: expectedUrl,
      attemptedUrls: 2,
      failedUrls: 1
    });
    expect(result.availableCount).toBe(1);
    expect(result.summarySent).toBe(false);

    expect(notify).toHaveBeenCalledTimes(1);
    const [alert] = notify.mock.calls[0] ?? [];
    expect(alert).toContain("🏔️ <b>JOFFRE LAKES AVAILABLE!</b> 🎉");
    expect(alert).toContain(`🔗 <b>BOOK NOW:</b> ${expectedUrl.replace("&", "&amp;")}`);

    expect(sleep.mock.calls).toEqual([[1_000]]);
    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith(
      expect.objectContaining({ attempt: 2, sourceUrl: expectedUrl, pageText: "joffre lakes book now" })
    );
  });

  it("records a unit whose URLs all fail as not available and keeps going", async () => {
    const { monitor, fetchPage, notify } = createHarness((url) =>
      url.includes("joffre") || url.endsWith("/dayuse/registration?date=2026-10-19")
        ? failure(url)
        : page(url, "<p>Garibaldi day use passes are sold out</p>")
    );

    const result = await monitor.runCheck([garibaldi, joffre], [today]);

    expect(fetchPage).toHaveBeenCalledTimes(14);
    expect(fetchPage.mock.calls[0]?.[0]).toBe(`${BASE_URL}/facility/joffre-lakes-provincial-park`);
    expect(result.units.map((unit) => [unit.unitId, unit.available, unit.verdict])).toEqual([
      ["joffre-lakes:2026-10-19", false, null],
      ["garibaldi:2026-10-19", false, "UNAVAILABLE"]
    ]);
    expect(result.units[0]?.failedUrls).toBe(7);
    expect(result.units[1]?.failedUrls).toBe(1);

    expect(result.summarySent).toBe(true);
    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify.mock.calls[0]?.[0]).toContain("📊 <b>Day-Use Pass Check Summary</b>");
  });

  it("skips the summary outside summary hours", async () => {
    const { monitor, notify } = createHarness(
      (url) => page(url, "<p>Joffre Lakes: sold out</p>"),
      { summaryOpen: false }
    );

    const result = await monitor.runCheck([joffre], [today]);

    expect(result.summarySent).toBe(false);
    expect(notify).not.toHaveBeenCalled();
  });

  it("skips the summary when any unit was available", async () => {
    const { monitor, fetchPage, notify } = createHarness((url) => {
      if (!url.includes("date=")) {
        return failure(url);
      }
      return url.includes("2026-10-19")
        ? page(url, "<p>Joffre Lakes: book now</p>")
        : page(url, "<p>Joffre Lakes: sold out</p>");
    });

    const result = await monitor.runCheck([joffre], [today, tomorrow]);

    expect(fetchPage).toHaveBeenCalledTimes(2 + 7);
    expect(result.units.map((unit) => unit.available)).toEqual([true, false]);
    expect(result.availableCount).toBe(1);
    expect(result.summarySent).toBe(false);
    expect(notify).toHaveBeenCalledTimes(1);
  });

  it("checks every candidate URL when the first one reports no availability", async () => {
    const { monitor, fetchPage, sleep } = createHarness((url) =>
      page(url, "<p>Joffre Lakes: sold out</p>")
    );

    const result = await monitor.runCheck([joffre], [today, tomorrow]);

    expect(fetchPage).toHaveBeenCalledTimes(14);
    expect(sleep).toHaveBeenCalledTimes(13);
    expect(result.availableCount).toBe(0);
  });

  it("moves on to the next URL when a check throws", async () => {
    const { monitor, fetchPage, notify } = createHarness((url) => {
      if (url.endsWith("/facility/joffre-lakes-provincial-park")) {
        throw new Error("socket hang up");
      }
      return page(url, "<p>Joffre Lakes: book now</p>");
    });

    const result = await monitor.runCheck([joffre], [today]);

    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(result.units[0]).toMatchObject({
      available: true,
      verdict: "AVAILABLE",
      attemptedUrls: 2,
      failedUrls: 1
    });
    expect(notify).toHaveBeenCalledTimes(1);
  });

  it("keeps results for other units when every URL of one unit throws", async () => {
    const { monitor, notify } = createHarness((url) => {
      if (!url.includes("joffre")) {
        throw new Error("connection reset");
      }
      return page(url, "<p>Joffre Lakes: sold out</p>");
    });

    const result = await monitor.run([joffre, garibaldi], [today]);

    expect(result?.units.map((unit) => [unit.unitId, unit.available, unit.verdict])).toEqual([
      ["joffre-lakes:2026-10-19", false, "UNAVAILABLE"],
      ["garibaldi:2026-10-19", false, null]
    ]);
    expect(result?.units[0]?.failedUrls).toBe(1);
    expect(result?.units[1]?.failedUrls).toBe(7);
    expect(result?.summarySent).toBe(true);
    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify.mock.calls[0]?.[0]).toContain("📊 <b>Day-Use Pass Check Summary</b>");
  });

  it("stops at an AVAILABLE page even when the alert cannot be sent", async () => {
    const { monitor, fetchPage } = createHarness(
      (url) => page(url, "<p>Joffre Lakes: book now</p>"),
      {
        deliver: async () => {
          throw new Error("telegram down");
        }
      }
    );

    const result = await monitor.runCheck([joffre], [today]);

    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(result.units[0]).toMatchObject({ available: true, failedUrls: 1 });
  });

  it("reports failures outside the per-URL checks during active hours", async () => {
    const { monitor, notify } = createHarness((url) => page(url, "<p>Joffre Lakes: sold out</p>"), {
      deliver: async (message) => {
        if (message.includes("Check Summary")) {
          throw new Error("boom");
        }
        return true;
      }
    });

    await expect(monitor.run([joffre], [today])).resolves.toBeNull();
    expect(notify).toHaveBeenCalledTimes(2);
    expect(notify.mock.calls[1]?.[0]).toContain("🐛 Error: boom");
  });

  it("stays quiet about such failures outside active hours", async () => {
    const { monitor, notify } = createHarness((url) => page(url, "<p>Joffre Lakes: sold out</p>"), {
      activeOpen: false,
      deliver: async () => {
        throw new Error("boom");
      }
    });

    await expect(monitor.run([joffre], [today])).resolves.toBeNull();
    expect(notify).toHaveBeenCalledTimes(1);
  });
});
