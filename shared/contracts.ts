export type AvailabilityVerdict =
  | "AVAILABLE"
  | "UNAVAILABLE"
  | "UNCLEAR"
  | "NOT_THIS_PARK";

export interface ParkDefinition {
  id: string;
  name: string;
  /** Facility slug used by the reservation site routes. */
  slug: string;
  /** Older short facility slug, still tried as the last candidate URL. */
  shortSlug: string;
  /** Lowercase fragments that identify the park in page text. */
  keywords: string[];
  /** Lower is more urgent. */
  priority: number;
  emoji: string;
}

export interface DateTarget {
  key: string;
  label: string;
  offsetDays: number;
  /** 2026-10-19 */
  isoDate: string;
  /** 20261019 */
  compactDate: string;
  /** October 19, 2026 */
  displayDate: string;
  /** 10/19/2026 */
  shortDate: string;
  dayName: string;
  year: number;
  month: number;
  day: number;
}

export interface CheckUnit {
  id: string;
  park: ParkDefinition;
  date: DateTarget;
  candidateUrls: string[];
}

export interface ClassificationEvidence {
  matchedKeywords: string[];
  availabilityPhrases: string[];
  unavailabilityPhrases: string[];
  hasBookingControls: boolean;
  bookingControlCount: number;
  dateInputCount: number;
  mentionsTargetDate: boolean;
}

export interface ClassificationResult {
  verdict: AvailabilityVerdict;
  evidence: ClassificationEvidence;
}

export interface UnitResult {
  unitId: string;
  parkId: string;
  parkName: string;
  date: DateTarget;
  available: boolean;
  /** Verdict of the last page that loaded, null when every URL failed. */
  verdict: AvailabilityVerdict | null;
  evidence: ClassificationEvidence | null;
  sourceUrl: string | null;
  attemptedUrls: number;
  failedUrls: number;
}

export interface RunResult {
  startedAt: string;
  finishedAt: string;
  units: UnitResult[];
  availableCount: number;
  summarySent: boolean;
}
