import { load, type CheerioAPI } from "cheerio";
import {
  AVAILABILITY_PHRASES,
  BOOKING_ACTION_WORDS,
  DATE_FIELD_NAME_WORDS,
  UNAVAILABILITY_PHRASES
} from "../constants/availability-phrases.js";
import { escapeRegExp, normalizeWhitespace } from "../../shared/text-utils.js";
import type {
  AvailabilityVerdict,
  ClassificationEvidence,
  ClassificationResult,
  DateTarget,
  ParkDefinition
} from "../../shared/contracts.js";

export interface ClassifyAvailabilityInput {
  /** Lowercase page text. */
  pageText: string;
  parkKeywords: readonly string[];
  document?: CheerioAPI | null;
  targetDate?: DateTarget | null;
}

export interface ParsedPage {
  pageText: string;
  document: CheerioAPI | null;
}

interface BookingControls {
  bookingControlCount: number;
  dateInputCount: number;
}

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december"
];

const phrasePatternCache = new Map<string, RegExp>();

const phrasePattern = (phrase: string): RegExp => {
  let pattern = phrasePatternCache.get(phrase);
  if (!pattern) {
    pattern = new RegExp(`\\b${escapeRegExp(phrase).replace(/ /g, "\\s+")}\\b`);
    phrasePatternCache.set(phrase, pattern);
  }
  return pattern;
};

const findPhrases = (pageText: string, phrases: readonly string[]): string[] =>
  phrases.filter((phrase) => phrasePattern(phrase).test(pageText));

/**
 * Blanks out every sold-out marker so negated forms such as "not available"
 * or "no passes available" are not also counted as availability phrases.
 */
const maskPhrases = (pageText: string, phrases: readonly string[]): string =>
  phrases.reduce(
    (text, phrase) => text.replace(new RegExp(phrasePattern(phrase).source, "g"), " | "),
    pageText
  );

const emptyEvidence = (): ClassificationEvidence => ({
  matchedKeywords: [],
  availabilityPhrases: [],
  unavailabilityPhrases: [],
  hasBookingControls: false,
  bookingControlCount: 0,
  dateInputCount: 0,
  mentionsTargetDate: false
});

const pad2 = (value: number): string => String(value).padStart(2, "0");

/**
 * Textual renderings of a date that commonly show up on booking pages:
 * "2026-10-05", "october 5", "october 05", "oct 5", "5 october", "10/05".
 */
export const buildDateKeywords = (target: DateTarget): string[] => {
  const monthName = MONTH_NAMES[target.month - 1] ?? "";
  const shortMonthName = monthName.slice(0, 3);

  return [
    ...new Set([
      target.isoDate,
      `${monthName} ${target.day}`,
      `${monthName} ${pad2(target.day)}`,
      `${shortMonthName} ${target.day}`,
      `${target.day} ${monthName}`,
      `${pad2(target.month)}/${pad2(target.day)}`
    ])
  ];
};

export const findBookingControls = ($: CheerioAPI): BookingControls => {
  const bookingControlCount = $("button, a")
    .toArray()
    .filter((element) => {
      const label = $(element).text().toLowerCase();
      return BOOKING_ACTION_WORDS.some((word) => label.includes(word));
    }).length;

  const dateInputCount = $("input[name], select[name]")
    .toArray()
    .filter((element) => {
      const name = ($(element).attr("name") ?? "").toLowerCase();
      return DATE_FIELD_NAME_WORDS.some((word) => name.includes(word));
    }).length;

  return { bookingControlCount, dateInputCount };
};

/**
 * Precedence: a sold-out marker with no positive signal is UNAVAILABLE; a
 * positive signal with no sold-out marker is AVAILABLE; anything mixed or
 * silent is UNCLEAR.
 */
export const decideVerdict = (
  evidence: Pick<
    ClassificationEvidence,
    "availabilityPhrases" | "unavailabilityPhrases" | "hasBookingControls"
  >
): Exclude<AvailabilityVerdict, "NOT_THIS_PARK"> => {
  const hasAvailabilitySignal =
    evidence.availabilityPhrases.length > 0 || evidence.hasBookingControls;
  const hasUnavailabilitySignal = evidence.unavailabilityPhrases.length > 0;

  if (hasUnavailabilitySignal && !hasAvailabilitySignal) {
    return "UNAVAILABLE";
  }

  if (hasAvailabilitySignal && !hasUnavailabilitySignal) {
    return "AVAILABLE";
  }

  return "UNCLEAR";
};

export const classifyAvailability = ({
  pageText,
  parkKeywords,
  document = null,
  targetDate = null
}: ClassifyAvailabilityInput): ClassificationResult => {
  const matchedKeywords = parkKeywords.filter(
    (keyword) => keyword.length > 0 && pageText.includes(keyword.toLowerCase())
  );

  if (!matchedKeywords.length) {
    return { verdict: "NOT_THIS_PARK", evidence: emptyEvidence() };
  }

  const controls = document
    ? findBookingControls(document)
    : { bookingControlCount: 0, dateInputCount: 0 };

  const evidence: ClassificationEvidence = {
    matchedKeywords,
    availabilityPhrases: findPhrases(
      maskPhrases(pageText, UNAVAILABILITY_PHRASES),
      AVAILABILITY_PHRASES
    ),
    unavailabilityPhrases: findPhrases(pageText, UNAVAILABILITY_PHRASES),
    hasBookingControls: controls.bookingControlCount > 0 || controls.dateInputCount > 0,
    bookingControlCount: controls.bookingControlCount,
    dateInputCount: controls.dateInputCount,
    mentionsTargetDate: targetDate
      ? buildDateKeywords(targetDate).some((keyword) => pageText.includes(keyword))
      : false
  };

  return { verdict: decideVerdict(evidence), evidence };
};

/**
 * Parses HTML into a cheerio document and its lowercase visible text.
 * Script and style bodies are dropped so inline JavaScript cannot leak
 * phrases into the text.
 */
export const parsePage = (html: string): ParsedPage => {
  try {
    const $ = load(html);
    $("script, style, noscript").remove();
    // Separate adjacent elements so "<h1>Park</h1><p>Book now</p>" reads as two words.
    $("*").append(" ");
    return {
      pageText: normalizeWhitespace($.root().text()).toLowerCase(),
      document: $
    };
  } catch {
    return { pageText: "", document: null };
  }
};

export const extractPageText = (html: string): string => parsePage(html).pageText;

export const classifyPage = (
  html: string,
  park: ParkDefinition,
  targetDate: DateTarget | null = null
): ClassificationResult => {
  const { pageText, document } = parsePage(html);
  return classifyAvailability({
    pageText,
    parkKeywords: park.keywords,
    document,
    targetDate
  });
};
