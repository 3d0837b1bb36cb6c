import { hourInTimeZone } from "../services/date-targets.js";

export type HourGate = (now: Date) => boolean;

export const createHourGate = (hours: readonly number[], timeZone: string): HourGate => {
  const allowed = new Set(hours);
  return (now) => allowed.has(hourInTimeZone(now, timeZone));
};

export const alwaysOpen: HourGate = () => true;

/**
 * Parses "7,12,19", "6-23" or a mix such as "6-9,12" into sorted unique hours.
 * Throws on anything outside 0-23.
 */
export const parseHourList = (value: string): number[] => {
  const hours = new Set<number>();

  for (const rawToken of value.split(",")) {
    const token = rawToken.trim();
    if (!token) {
      continue;
    }

    const rangeMatch = /^(\d{1,2})\s*-\s*(\d{1,2})$/.exec(token);
    if (rangeMatch) {
      const start = Number(rangeMatch[1]);
      const end = Number(rangeMatch[2]);
      if (start > 23 || end > 23 || start > end) {
        throw new Error(`Invalid hour range "${token}"`);
      }
      for (let hour = start; hour <= end; hour++) {
        hours.add(hour);
      }
      continue;
    }

    if (!/^\d{1,2}$/.test(token) || Number(token) > 23) {
      throw new Error(`Invalid hour "${token}"`);
    }
    hours.add(Number(token));
  }

  return [...hours].sort((left, right) => left - right);
};
