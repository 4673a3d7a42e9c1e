import { readFileSync } from "node:fs";

export function fixture(name: string): string {
  return readFileSync(new URL(`./${name}`, import.meta.url), "utf8");
}

export const DELAYED_ARRIVAL_RENDERED =
  "[2026-10-18T10:08:12.1234567+01:00 v16.0]:\n\t\nUpdate Origin: TD\n\n" +
  "RID: 202610187654321 SSD: 2026-10-18 UID: C12345 \n" +
  "\n\t-- RDNGSTN | Public Time Arrive: 10:00 | Public Time Depart: 10:01" +
  " | Working Time Arrive: 09:59:30 | Working Time Depart: 10:01" +
  " | Arrival: ACTUAL 10:07 (Source: TD) | Departure: ESTIMATED 10:08 (Source: Darwin)" +
  "\n\t   DELAY: 7.000000\n" +
  "\n\n\t-- DIDCOTP | Working Time Pass: 10:15 | Pass: \n";
