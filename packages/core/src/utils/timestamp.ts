import { FormatError } from "./errors";

const TIMESTAMP_PATTERN = /^(\d+):(\d{2}):(\d{2}),(\d{3})$/;

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

// Products such as 3661.234 * 1000 can land a hair under the integer.
const TRUNCATION_TOLERANCE_MS = 1e-6;

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/**
 * Truncates (never rounds) a time in seconds to whole milliseconds.
 */
export const toMilliseconds = (seconds: number): number => {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return 0;
  }
  return Math.floor(seconds * MS_PER_SECOND + TRUNCATION_TOLERANCE_MS);
};

/**
 * Formats seconds as `HH:MM:SS,mmm`. Hours are not wrapped at 24.
 *
 * @example encodeTimestamp(3661.234) // "01:01:01,234"
 */
export const encodeTimestamp = (seconds: number): string => {
  const totalMs = toMilliseconds(seconds);
  const hours = Math.floor(totalMs / MS_PER_HOUR);
  const minutes = Math.floor((totalMs % MS_PER_HOUR) / MS_PER_MINUTE);
  const secs = Math.floor((totalMs % MS_PER_MINUTE) / MS_PER_SECOND);
  const millis = totalMs % MS_PER_SECOND;
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)},${pad(millis, 3)}`;
};

/**
 * Parses `HH:MM:SS,mmm` back into seconds.
 *
 * @throws FormatError when the text does not match the timestamp grammar.
 */
export const decodeTimestamp = (text: string): number => {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    throw new FormatError(`Invalid timestamp: "${text}"`);
  }
  const [, hours, minutes, secs, millis] = match;
  const totalMs =
    Number(hours) * MS_PER_HOUR +
    Number(minutes) * MS_PER_MINUTE +
    Number(secs) * MS_PER_SECOND +
    Number(millis);
  return totalMs / MS_PER_SECOND;
};
