/**
 * Plain-text rendering of a decoded Push Port message
 */
import { arrivalDelay, isLate } from "./delay";
import type { Location, LocationEvent, Message, Timestamp, UniqueResponse } from "./model";

const SCHEDULED_TIMES: ReadonlyArray<["pta" | "ptd" | "wta" | "wtd" | "wtp", string]> = [
  ["pta", "Public Time Arrive"],
  ["ptd", "Public Time Depart"],
  ["wta", "Working Time Arrive"],
  ["wtd", "Working Time Depart"],
  ["wtp", "Working Time Pass"],
];

const EVENTS: ReadonlyArray<["arrival" | "departure" | "pass", string]> = [
  ["arrival", "Arrival"],
  ["departure", "Departure"],
  ["pass", "Pass"],
];

export function formatDelay(minutes: number): string {
  return minutes.toFixed(6);
}

export function renderMessage(message: Message): string {
  let s = `[${message.timestamp} v${message.version}]:`;

  if (message.uniqueResponse.updateOrigin !== "") {
    s += `\n\t${renderUniqueResponse(message.uniqueResponse)}`;
  }

  return s;
}

export function renderUniqueResponse(response: UniqueResponse): string {
  return `\nUpdate Origin: ${response.updateOrigin}\n\n${renderTimestamp(response.timestamp)}`;
}

export function renderTimestamp(timestamp: Timestamp): string {
  let s = "";

  if (timestamp.rid !== "") s += `RID: ${timestamp.rid} `;
  if (timestamp.ssd !== "") s += `SSD: ${timestamp.ssd} `;
  if (timestamp.uid !== "") s += `UID: ${timestamp.uid} `;

  for (const location of timestamp.locations) {
    s += `\n${renderLocation(location)}`;
  }

  return s;
}

/**
 * Throws TimeFormatError if the arrival times cannot be compared.
 */
export function renderLocation(location: Location): string {
  let s = `\n\t-- ${location.tpl}`;

  for (const [field, label] of SCHEDULED_TIMES) {
    if (location[field] !== "") s += ` | ${label}: ${location[field]}`;
  }

  for (const [field, label] of EVENTS) {
    const event = location[field];
    if (event) s += ` | ${label}: ${renderEvent(event)}`;
  }

  const delay = arrivalDelay(location);
  if (delay !== undefined && isLate(delay)) {
    s += `\n\t   DELAY: ${formatDelay(delay)}`;
  }

  return s + "\n";
}

export function renderEvent(event: LocationEvent): string {
  const parts: string[] = [];

  if (event.actual !== "") parts.push(`ACTUAL ${event.actual}`);
  if (event.estimated !== "") parts.push(`ESTIMATED ${event.estimated}`);
  if (event.source !== "") parts.push(`(Source: ${event.source})`);

  return parts.join(" ");
}
