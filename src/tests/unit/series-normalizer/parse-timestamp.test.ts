import { describe, it, expect } from "@effect/vitest";
import { Option } from "effect";
import {
  parseTimestamp,
  toDateKey,
  toGregorianYear,
  toHourOfDay,
} from "../../../series-normalizer/parse-timestamp.js";

const parsedTime = (text: string) =>
  Option.map(parseTimestamp(text), (parsed) => parsed.timestamp.getTime());

describe("parse-timestamp", () => {
  describe("parseTimestamp", () => {
    it("should parse the dotted time format", () => {
      expect(parsedTime("15/03/2024 10.15")).toEqual(Option.some(Date.UTC(2024, 2, 15, 10, 15)));
    });

    it("should parse the colon time format with single-digit fields", () => {
      expect(parsedTime("5/3/2024 7:05")).toEqual(Option.some(Date.UTC(2024, 2, 5, 7, 5)));
    });

    it("should ignore surrounding whitespace", () => {
      expect(parsedTime("  15/03/2024 10:15 ")).toEqual(Option.some(Date.UTC(2024, 2, 15, 10, 15)));
    });

    it("should convert Buddhist-era years", () => {
      expect(parsedTime("15/03/2567 10:15")).toEqual(Option.some(Date.UTC(2024, 2, 15, 10, 15)));
    });

    it("should roll 24.00 over to midnight of the next day", () => {
      const parsed = parseTimestamp("31/12/2566 24.00");

      expect(Option.isSome(parsed)).toBe(true);
      if (Option.isSome(parsed)) {
        expect(parsed.value.timestamp.toISOString()).toBe("2024-01-01T00:00:00.000Z");
        expect(parsed.value.rolledOver).toBe(true);
      }
    });

    it("should not flag ordinary timestamps as rolled over", () => {
      expect(Option.map(parseTimestamp("01/01/2024 00:00"), (parsed) => parsed.rolledOver)).toEqual(
        Option.some(false)
      );
    });

    it("should validate leap days after the era conversion", () => {
      expect(Option.isNone(parseTimestamp("29/02/2023 10.00"))).toBe(true);
      expect(parsedTime("29/02/2567 10.00")).toEqual(Option.some(Date.UTC(2024, 1, 29, 10, 0)));
    });

    it.each([
      "32/01/2024 10.00",
      "15/13/2024 10.00",
      "15/03/2024 24.15",
      "15/03/2024 25.00",
      "15/03/2024 10.60",
      "15/03/2024",
      "2024-03-15 10:00",
      "",
    ])("should reject %j", (text) => {
      expect(Option.isNone(parseTimestamp(text))).toBe(true);
    });
  });

  describe("toGregorianYear", () => {
    it("should only shift years above 2500", () => {
      expect(toGregorianYear(2567)).toBe(2024);
      expect(toGregorianYear(2500)).toBe(2500);
      expect(toGregorianYear(2024)).toBe(2024);
    });
  });

  describe("toDateKey / toHourOfDay", () => {
    it("should derive the calendar date and fractional hour", () => {
      const timestamp = new Date(Date.UTC(2024, 0, 1, 16, 45));
      expect(toDateKey(timestamp)).toBe("2024-01-01");
      expect(toHourOfDay(timestamp)).toBe(16.75);
    });
  });
});
