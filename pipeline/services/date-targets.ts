import type { CheckUnit, DateTarget, ParkDefinition } from "../../shared/contracts.js";

export const DEFAULT_TIME_ZONE = "America/Vancouver";
export const DEFAULT_WINDOW_DAYS = 3;

const DAY_MS = 24 * 60 * 60 * 1000;

const DATE_KEYS = ["today", "tomorrow", "day_after"] as const;
const DATE_LABELS = ["today", "tomorrow", "day after tomorrow"] as const;

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface DateWindowOptions {
  timeZone?: string;
  days?: number;
}

const pad2 = (value: number): string => String(value).padStart(2, "0");

/** Calendar date of `now` as seen in `timeZone`. */
export const calendarDateInTimeZone = (now: Date, timeZone: string): CalendarDate => {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).formatToParts(now);

  const readPart = (type: "year" | "month" | "day"): number =>
    Number(parts.find((part) => part.type === type)?.value ?? Number.NaN);

  return { year: readPart("year"), month: readPart("month"), day: readPart("day") };
};

export const hourInTimeZone = (now: Date, timeZone: string): number => {
  const hourText = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hour: "numeric",
    hourCycle: "h23"
  }).format(now);
  return Number(hourText) % 24;
};

const labelForOffset = (offsetDays: number): { key: string; label: string } => ({
  key: DATE_KEYS[offsetDays] ?? `day_plus_${offsetDays}`,
  label: DATE_LABELS[offsetDays] ?? `in ${offsetDays} days`
});

/**
 * Builds a DateTarget for `offsetDays` after the calendar date `base`.
 * Arithmetic runs on a UTC midnight so daylight-saving shifts in the
 * reference zone cannot skip or repeat a day.
 */
export const buildDateTarget = (base: CalendarDate, offsetDays: number): DateTarget => {
  const utcMidnight = new Date(
    Date.UTC(base.year, base.month - 1, base.day) + offsetDays * DAY_MS
  );
  const year = utcMidnight.getUTCFullYear();
  const month = utcMidnight.getUTCMonth() + 1;
  const day = utcMidnight.getUTCDate();

  const longMonth = new Intl.DateTimeFormat("en-US", { timeZone: "UTC", month: "long" }).format(
    utcMidnight
  );
  const dayName = new Intl.DateTimeFormat("en-US", { timeZone: "UTC", weekday: "long" }).format(
    utcMidnight
  );

  return {
    ...labelForOffset(offsetDays),
    offsetDays,
    isoDate: `${year}-${pad2(month)}-${pad2(day)}`,
    compactDate: `${year}${pad2(month)}${pad2(day)}`,
    displayDate: `${longMonth} ${pad2(day)}, ${year}`,
    shortDate: `${pad2(month)}/${pad2(day)}/${year}`,
    dayName,
    year,
    month,
    day
  };
};

export const buildDateWindow = (now: Date, options?: DateWindowOptions): DateTarget[] => {
  const timeZone = options?.timeZone ?? DEFAULT_TIME_ZONE;
  const days = options?.days ?? DEFAULT_WINDOW_DAYS;
  const base = calendarDateInTimeZone(now, timeZone);

  return Array.from({ length: days }, (_, offsetDays) => buildDateTarget(base, offsetDays));
};

/**
 * Candidate pages for one park and date, most specific first. The site's
 * routing for day-use passes is not stable, so several known variants are
 * tried with the date under both `date` and `arrivalDate`.
 */
export const buildCandidateUrls = (
  baseUrl: string,
  park: ParkDefinition,
  date: DateTarget
): string[] => {
  const root = baseUrl.replace(/\/+$/, "");
  const facility = encodeURIComponent(park.slug);
  const iso = date.isoDate;

  return [
    `${root}/facility/${facility}`,
    `${root}/dayuse/registration?facility=${facility}&date=${iso}`,
    `${root}/dayuse/registration?facility=${facility}&arrivalDate=${iso}`,
    `${root}/dayuse/registration?date=${iso}`,
    `${root}/search?facility=${facility}&date=${iso}&partySize=1`,
    `${root}/booking/${facility}?date=${iso}`,
    `${root}/facility/${encodeURIComponent(park.shortSlug)}?date=${iso}`
  ];
};

export const sortParksByPriority = (parks: readonly ParkDefinition[]): ParkDefinition[] =>
  [...parks].sort((left, right) => left.priority - right.priority);

export const buildCheckUnits = (
  parks: readonly ParkDefinition[],
  window: readonly DateTarget[],
  baseUrl: string
): CheckUnit[] =>
  sortParksByPriority(parks).flatMap((park) =>
    window.map((date) => ({
      id: `${park.id}:${date.isoDate}`,
      park,
      date,
      candidateUrls: buildCandidateUrls(baseUrl, park, date)
    }))
  );

/**
 * Restricts the registry to `parkIds` (all parks when the list is empty).
 * Throws on ids the registry does not know.
 */
export const selectParks = (
  registry: readonly ParkDefinition[],
  parkIds: readonly string[]
): ParkDefinition[] => {
  if (!parkIds.length) {
    return sortParksByPriority(registry);
  }

  const byId = new Map(registry.map((park) => [park.id, park]));
  const unknownIds = parkIds.filter((id) => !byId.has(id));
  if (unknownIds.length) {
    throw new Error(
      `Unknown park id(s): ${unknownIds.join(", ")}. Known parks: ${[...byId.keys()].join(", ")}`
    );
  }

  return sortParksByPriority(registry.filter((park) => parkIds.includes(park.id)));
};
