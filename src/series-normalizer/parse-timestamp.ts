import { Option } from "effect";
import type { ParsedTimestamp } from "./types.js";

const TIMESTAMP_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})\s+(\d{1,2})[.:](\d{2})$/;

// Years written in the Buddhist calendar run 543 ahead of the Gregorian one.
const BUDDHIST_ERA_THRESHOLD = 2500;
const BUDDHIST_ERA_OFFSET = 543;

const DAY_MS = 24 * 60 * 60 * 1000;

export const toGregorianYear = (year: number): number =>
  year > BUDDHIST_ERA_THRESHOLD ? year - BUDDHIST_ERA_OFFSET : year;

/**
 * Parses `DD/MM/YYYY HH.MM` or `DD/MM/YYYY HH:MM`.
 *
 * `24.00` is read as 00:00 of the following day. Calendar dates that do not
 * exist (31/02) are rejected.
 */
export const parseTimestamp = (text: string): Option.Option<ParsedTimestamp> => {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) {
    return Option.none();
  }

  const [, dayText, monthText, yearText, hourText, minuteText] = match;
  const day = Number(dayText);
  const month = Number(monthText);
  const year = toGregorianYear(Number(yearText));
  const hour = Number(hourText);
  const minute = Number(minuteText);

  const rolledOver = hour === 24 && minute === 0;
  if ((hour > 23 && !rolledOver) || minute > 59) {
    return Option.none();
  }

  const midnight = Date.UTC(year, month - 1, day);
  const calendarDate = new Date(midnight);
  if (
    calendarDate.getUTCFullYear() !== year ||
    calendarDate.getUTCMonth() !== month - 1 ||
    calendarDate.getUTCDate() !== day
  ) {
    return Option.none();
  }

  const timestamp = rolledOver
    ? new Date(midnight + DAY_MS)
    : new Date(Date.UTC(year, month - 1, day, hour, minute));

  return Option.some({ timestamp, rolledOver });
};

export const toDateKey = (timestamp: Date): string => timestamp.toISOString().slice(0, 10);

export const toHourOfDay = (timestamp: Date): number =>
  timestamp.getUTCHours() + timestamp.getUTCMinutes() / 60;
