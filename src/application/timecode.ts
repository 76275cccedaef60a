import { ValidationError } from "../domain/errors";
import type { TimestampInput } from "../domain/types";

const NUMERIC = /^\d+(\.\d+)?$/;
const INTEGER = /^\d+$/;

export function parseTimestamp(value: TimestampInput, field = "timestamp"): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(`${field} must be a non-negative number of seconds.`, [
        { path: field, message: "invalid seconds" }
      ]);
    }
    return roundMs(value);
  }

  const text = value.trim();
  if (NUMERIC.test(text)) {
    return roundMs(Number(text));
  }

  const parts = text.split(":");
  if (parts.length < 2 || parts.length > 3) {
    throw invalidTimestamp(field, value);
  }
  const last = parts[parts.length - 1];
  const leading = parts.slice(0, -1);
  if (!NUMERIC.test(last) || leading.some((part) => !INTEGER.test(part))) {
    throw invalidTimestamp(field, value);
  }

  const numbers = parts.map(Number);
  // every field after the first is a base-60 digit
  if (numbers.slice(1).some((part) => part >= 60)) {
    throw invalidTimestamp(field, value);
  }

  const [hours, minutes, seconds] = numbers.length === 3 ? numbers : [0, numbers[0], numbers[1]];
  return roundMs(hours * 3600 + minutes * 60 + seconds);
}

export function formatTimestamp(seconds: number) {
  const total = Math.max(0, Math.round(seconds));
  const hrs = Math.floor(total / 3600);
  const mins = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  const tail = `${pad(mins)}:${pad(secs)}`;
  return hrs > 0 ? `${hrs}:${tail}` : `${mins}:${pad(secs)}`;
}

export function toMs(seconds: number) {
  return Math.round(seconds * 1000);
}

export function fromMs(ms: number) {
  return ms / 1000;
}

function roundMs(seconds: number) {
  return fromMs(toMs(seconds));
}

function invalidTimestamp(field: string, value: string) {
  return new ValidationError(`${field} "${value}" is not a valid timestamp (use seconds, m:ss or h:mm:ss).`, [
    { path: field, message: "invalid timestamp" }
  ]);
}

function pad(value: number) {
  return value.toString().padStart(2, "0");
}
