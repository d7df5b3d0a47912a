import { ParseResult } from "../types";

export const NOT_A_NUMBER = "Please enter a valid number.";
export const OUT_OF_RANGE = "Invalid selection.";

/**
 * Parses a 1-based choice among `count` options.
 *
 * @returns The chosen number, or the message to print when the input is not an integer
 * or falls outside 1..count
 */
export function parseSelection(raw: string, count: number): ParseResult<number> {
  const value = raw.trim();

  if (!/^[+-]?\d+$/.test(value)) {
    return { ok: false, error: NOT_A_NUMBER };
  }

  const choice = parseInt(value, 10);
  if (choice < 1 || choice > count) {
    return { ok: false, error: OUT_OF_RANGE };
  }

  return { ok: true, value: choice };
}

/**
 * Formats a date in local time as YYYYMMDD_HHMMSS.
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");

  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

  return `${day}_${time}`;
}
