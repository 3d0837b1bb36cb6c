/**
 * Weak lexical markers. Both lists are scanned in full on every page and may
 * match at the same time; see `decideVerdict` for precedence.
 */
export const AVAILABILITY_PHRASES = [
  "available",
  "book now",
  "reserve now",
  "select date",
  "choose date",
  "select time",
  "purchase",
  "add to cart",
  "book online",
  "reservation available",
  "make reservation",
  "day use pass",
  "day pass available",
  "passes available",
  "book this date",
  "available for booking",
  "reserve this date"
] as const;

export const UNAVAILABILITY_PHRASES = [
  "sold out",
  "fully booked",
  "no availability",
  "unavailable",
  "no passes available",
  "booking closed",
  "not available",
  "waitlist only",
  "no day use passes",
  "passes sold out",
  "date unavailable",
  "not accepting reservations",
  "fully reserved"
] as const;

/** Words in a button or link label that indicate a booking action. */
export const BOOKING_ACTION_WORDS = ["book", "reserve", "purchase", "select", "available"] as const;

/** Fragments of a form control `name` that indicate a date picker. */
export const DATE_FIELD_NAME_WORDS = ["date", "arrival", "visit"] as const;
