/**
 * Arrival delay at a single location
 */
import type { Location } from "./model";
import { parseTimeOfDay } from "./time";

export const MINUTES_PER_DAY = 24 * 60;

/** Differences larger than this are taken to cross midnight. */
export const MIDNIGHT_WRAP_MINUTES = MINUTES_PER_DAY / 2;

/**
 * Minutes between the actual arrival and the scheduled arrival (public time,
 * falling back to working time). Negative means early.
 *
 * Returns undefined when there is no arrival, no actual time, or no scheduled
 * arrival to compare against. Throws TimeFormatError on an unreadable time.
 */
export function arrivalDelay(location: Location): number | undefined {
  const arrival = location.arrival;
  if (!arrival || arrival.actual === "") return undefined;

  const scheduled = location.pta || location.wta;
  if (scheduled === "") return undefined;

  const actualTime = parseTimeOfDay(arrival.actual);
  const scheduledTime = parseTimeOfDay(scheduled);

  let minutes = actualTime.since(scheduledTime).total({ unit: "minutes" });

  if (minutes > MIDNIGHT_WRAP_MINUTES) {
    minutes -= MINUTES_PER_DAY;
  } else if (minutes < -MIDNIGHT_WRAP_MINUTES) {
    minutes += MINUTES_PER_DAY;
  }

  return minutes;
}

/** Only positive delays are reported. */
export function isLate(delay: number | undefined): boolean {
  return delay !== undefined && delay > 0;
}
