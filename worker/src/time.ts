/**
 * Time-of-day parsing for Push Port schedule and forecast times
 *
 * Darwin sends public times as "HH:MM" and working/actual times as either
 * "HH:MM" or "HH:MM:SS". Both sides are read with the same two layouts.
 */
import { Temporal } from "temporal-polyfill";
import { TimeFormatError } from "./errors";

const MINUTE_LAYOUT = /^([01]\d|2[0-3]):[0-5]\d$/;
// no leap seconds: Temporal would clamp "60" to 59
const SECOND_LAYOUT = /^([01]\d|2[0-3]):[0-5]\d:[0-5]\d$/;

/**
 * Parse "HH:MM" (length 5) or "HH:MM:SS" (anything else).
 * Callers must skip empty strings; they are rejected here like any bad input.
 */
export function parseTimeOfDay(value: string): Temporal.PlainTime {
  const layout = value.length === 5 ? MINUTE_LAYOUT : SECOND_LAYOUT;
  if (!layout.test(value)) {
    throw new TimeFormatError(value);
  }

  try {
    return Temporal.PlainTime.from(value, { overflow: "reject" });
  } catch (error) {
    // e.g. "25:00" or "10:61"
    throw new TimeFormatError(value, { cause: error });
  }
}
