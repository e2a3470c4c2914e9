import { z } from "zod";
import { TaskError } from "./errors.js";
import { formatTimestamp, parseIsoTime } from "./time.js";
import type { Task, TimeInput } from "./types.js";

const eventSchema = z.string().trim().min(1);
const valueSchema = z.number().int();

export function toTimeInput(raw: unknown): TimeInput {
  if (typeof raw === "string") return { kind: "text", text: raw };
  if (raw instanceof Date) return { kind: "timestamp", date: raw };
  throw new TaskError(
    "invalid_time",
    `Time must be an ISO string or a Date, got ${raw === null ? "null" : typeof raw}`,
  );
}

/** Validated canonical time text. Text input is kept exactly as given. */
export function normalizeTime(input: TimeInput): string {
  switch (input.kind) {
    case "text":
      if (!parseIsoTime(input.text)) {
        throw new TaskError(
          "invalid_time",
          `Invalid time format: ${input.text}. Use ISO format (YYYY-MM-DDThh:mm:ss).`,
        );
      }
      return input.text;
    case "timestamp":
      if (Number.isNaN(input.date.getTime())) {
        throw new TaskError("invalid_time", "Time must be a valid Date");
      }
      return formatTimestamp(input.date);
  }
}

/**
 * Lookup key for remove: a Date becomes canonical text, text passes through
 * without a parse check.
 */
export function timeKey(raw: string | Date): string {
  const input = toTimeInput(raw);
  return input.kind === "text" ? input.text : normalizeTime(input);
}

export function validateEvent(raw: unknown): string {
  const parsed = eventSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TaskError("invalid_event", "Event must be a non-empty string");
  }
  return parsed.data;
}

export function validateValue(raw: unknown): number {
  const parsed = valueSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TaskError("invalid_value", `Value must be an integer, got ${String(raw)}`);
  }
  return parsed.data;
}

/** Normalize a candidate task. Checks run in order time, event, value. */
export function validateTask(time: unknown, event: unknown, value: unknown): Task {
  return {
    time: normalizeTime(toTimeInput(time)),
    event: validateEvent(event),
    value: validateValue(value),
    completed: false,
  };
}
