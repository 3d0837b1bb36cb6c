import { errorMessage, escapeHtml } from "../../shared/text-utils.js";
import type {
  ClassificationEvidence,
  DateTarget,
  ParkDefinition,
  UnitResult
} from "../../shared/contracts.js";

const titleCase = (value: string): string =>
  value.replace(/\b[a-z]/g, (letter) => letter.toUpperCase());

const dateParts = (now: Date, timeZone: string): Record<string, string> => {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  }).formatToParts(now);

  return Object.fromEntries(parts.map((part) => [part.type, part.value]));
};

/** "14:05:09" in `timeZone`. */
export const formatClockTime = (now: Date, timeZone: string): string => {
  const parts = dateParts(now, timeZone);
  return `${parts.hour}:${parts.minute}:${parts.second}`;
};

/** "2026-10-19 14:05:09" in `timeZone`. */
export const formatTimestamp = (now: Date, timeZone: string): string => {
  const parts = dateParts(now, timeZone);
  return `${parts.year}-${parts.month}-${parts.day} ${formatClockTime(now, timeZone)}`;
};

interface AvailabilityAlertInput {
  park: ParkDefinition;
  date: DateTarget | null;
  sourceUrl: string;
  evidence: ClassificationEvidence;
  foundAt: Date;
  timeZone: string;
}

export const formatAvailabilityAlert = ({
  park,
  date,
  sourceUrl,
  evidence,
  foundAt,
  timeZone
}: AvailabilityAlertInput): string => {
  const lines = [`${park.emoji} <b>${escapeHtml(park.name.toUpperCase())} AVAILABLE!</b> 🎉`, ""];

  if (date) {
    lines.push(
      `📅 <b>Date:</b> ${date.displayDate}`,
      `🗓️ <b>Day:</b> ${date.dayName}`,
      `⏰ <b>When:</b> ${titleCase(date.label)}`,
      ""
    );
  }

  lines.push(
    "🎫 <b>Status:</b> Availability detected",
    `🔗 <b>BOOK NOW:</b> ${escapeHtml(sourceUrl)}`,
    ""
  );

  if (evidence.availabilityPhrases.length) {
    lines.push(
      `✅ <b>Indicators:</b> ${escapeHtml(evidence.availabilityPhrases.slice(0, 2).join(", "))}`
    );
  }
  if (evidence.hasBookingControls) {
    lines.push("🔘 <b>Booking:</b> Interactive elements found");
  }

  lines.push(
    "",
    `⚡ <b>URGENT:</b> ${escapeHtml(park.name)} passes disappear in minutes!`,
    "🏃 <b>Book immediately!</b>",
    "",
    `🕐 <b>Found:</b> ${formatClockTime(foundAt, timeZone)}`
  );

  return lines.join("\n");
};

export const formatRunSummary = (
  units: readonly UnitResult[],
  checkedAt: Date,
  timeZone: string
): string => {
  const lines = ["📊 <b>Day-Use Pass Check Summary</b>", ""];

  let currentParkId: string | null = null;
  for (const unit of units) {
    if (unit.parkId !== currentParkId) {
      if (currentParkId !== null) {
        lines.push("");
      }
      lines.push(`<b>${escapeHtml(unit.parkName)}</b>`);
      currentParkId = unit.parkId;
    }

    const status = unit.available ? "✅ AVAILABLE" : "❌ No availability";
    lines.push(
      `🔹 <b>${titleCase(unit.date.label)}:</b> ${unit.date.displayDate} (${unit.date.dayName}) - ${status}`
    );
  }

  lines.push(
    "",
    `⏰ <b>Checked:</b> ${formatTimestamp(checkedAt, timeZone)}`,
    "🔄 <b>Next check:</b> Next scheduled run",
    "",
    "📱 You'll get instant alerts when spots appear!"
  );

  return lines.join("\n");
};

export const formatMonitorError = (error: unknown, failedAt: Date, timeZone: string): string => {
  const detail = errorMessage(error);

  return [
    "⚠️ <b>Monitor Error</b>",
    "",
    "❌ Failed during day-use availability check",
    `🐛 Error: ${escapeHtml(detail.slice(0, 150))}`,
    `⏰ Time: ${formatTimestamp(failedAt, timeZone)}`,
    "🔄 Will retry on next scheduled run"
  ].join("\n");
};

export const formatStartupMessage = (
  parks: readonly ParkDefinition[],
  window: readonly DateTarget[]
): string => {
  const lines = ["🤖 <b>Day-Use Pass Monitor Started</b>", "", `🏞️ <b>Parks (${parks.length}):</b>`];

  for (const park of parks) {
    lines.push(`   ${park.emoji} ${escapeHtml(park.name)}`);
  }

  lines.push("", `📅 <b>Checking ${window.length} Day${window.length === 1 ? "" : "s"}:</b>`);
  for (const date of window) {
    lines.push(`   🔹 ${titleCase(date.label)}: ${date.displayDate} (${date.dayName})`);
  }

  lines.push("", "🔍 <b>Status:</b> Bot is online and monitoring!");
  return lines.join("\n");
};
