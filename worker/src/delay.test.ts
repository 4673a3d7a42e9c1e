import { describe, expect, it } from "vitest";
import { arrivalDelay, isLate } from "./delay";
import { TimeFormatError } from "./errors";
import { Location, LocationEvent, type LocationFields } from "./model";

function location(fields: Partial<LocationFields>): Location {
  return new Location({ tpl: "RDNGSTN", pta: "", ptd: "", wta: "", wtd: "", wtp: "", ...fields });
}

const arrivedAt = (actual: string) => new LocationEvent(actual, "", "TD");

describe("arrivalDelay", () => {
  it("is undefined without an arrival event", () => {
    expect(arrivalDelay(location({ pta: "10:00" }))).toBeUndefined();
  });

  it("is undefined when the arrival has no actual time", () => {
    const arrival = new LocationEvent("", "10:05", "Darwin");
    expect(arrivalDelay(location({ pta: "10:00", arrival }))).toBeUndefined();
  });

  it("is undefined for a source-only arrival", () => {
    const arrival = new LocationEvent("", "", "TD");
    expect(arrivalDelay(location({ pta: "10:00", arrival }))).toBeUndefined();
  });

  it("is undefined without a scheduled arrival", () => {
    expect(arrivalDelay(location({ ptd: "10:01", arrival: arrivedAt("10:07") }))).toBeUndefined();
  });

  it("measures late arrivals against the public time", () => {
    expect(arrivalDelay(location({ pta: "10:00", arrival: arrivedAt("10:07") }))).toBe(7);
  });

  it("reports early arrivals as negative", () => {
    expect(arrivalDelay(location({ pta: "10:00", arrival: arrivedAt("09:58") }))).toBe(-2);
  });

  it("is zero when on time", () => {
    expect(arrivalDelay(location({ pta: "09:05", arrival: arrivedAt("09:05") }))).toBe(0);
  });

  it("prefers the public time over the working time", () => {
    const delay = arrivalDelay(location({ pta: "10:00", wta: "10:01", arrival: arrivedAt("10:07") }));
    expect(delay).toBe(7);
  });

  it("falls back to the working time", () => {
    const delay = arrivalDelay(location({ wta: "10:01", arrival: arrivedAt("10:07") }));
    expect(delay).toBe(6);
  });

  it("keeps seconds on both sides", () => {
    const delay = arrivalDelay(location({ wta: "09:59:30", arrival: arrivedAt("10:07:00") }));
    expect(delay).toBe(7.5);
  });

  it("wraps arrivals after midnight", () => {
    expect(arrivalDelay(location({ pta: "23:58", arrival: arrivedAt("00:02") }))).toBe(4);
  });

  it("wraps early arrivals before midnight", () => {
    expect(arrivalDelay(location({ pta: "00:02", arrival: arrivedAt("23:58") }))).toBe(-4);
  });

  it("propagates unreadable actual times", () => {
    expect(() => arrivalDelay(location({ pta: "10:00", arrival: arrivedAt("9:5") }))).toThrow(
      TimeFormatError,
    );
  });

  it("propagates unreadable scheduled times", () => {
    expect(() => arrivalDelay(location({ wta: "10", arrival: arrivedAt("10:07") }))).toThrow(
      TimeFormatError,
    );
  });
});

describe("isLate", () => {
  it("only accepts positive delays", () => {
    expect(isLate(7)).toBe(true);
    expect(isLate(0.5)).toBe(true);
    expect(isLate(0)).toBe(false);
    expect(isLate(-2)).toBe(false);
    expect(isLate(undefined)).toBe(false);
  });

  it("leaves an on-time delay as a number", () => {
    const delay = arrivalDelay(location({ pta: "09:05", arrival: arrivedAt("09:05") }));
    expect(isLate(delay)).toBe(false);
    expect(typeof delay).toBe("number");
  });
});
