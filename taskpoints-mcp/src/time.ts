/**
 * ISO-8601 parsing and formatting for task times.
 *
 * Accepted: a date in extended (`YYYY-MM-DD`) or basic (`YYYYMMDD`) form,
 * optionally followed by `T` (or a space) and `HH`, `HH:MM`, `HH:MM:SS` or
 * `HH:MM:SS.ffffff` (colons may be left out throughout), optionally followed
 * by `Z`, `±HH:MM` or `±HHMM`. Times without an offset are local wall-clock
 * times.
 */

const ISO_RE =
  /^(?<year>\d{4})(?<ds>-?)(?<month>\d{2})\k<ds>(?<day>\d{2})(?:[T ](?<hour>\d{2})(?:(?<ts>:?)(?<minute>\d{2})(?:\k<ts>(?<second>\d{2})(?:\.(?<frac>\d{1,6}))?)?)?(?:(?<zulu>Z)|(?<sign>[+-])(?<offHour>\d{2}):?(?<offMinute>\d{2}))?)?$/;

function daysInMonth(year: number, month: number): number {
  const d = new Date(0);
  d.setUTCFullYear(year, month, 0);
  return d.getUTCDate();
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** Parse ISO-8601 text into a Date, or null when the text is not a valid ISO date-time. */
export function parseIsoTime(text: string): Date | null {
  const g = ISO_RE.exec(text)?.groups;
  if (!g) return null;

  const year = Number(g.year);
  const month = Number(g.month);
  const day = Number(g.day);
  const hour = Number(g.hour ?? 0);
  const minute = Number(g.minute ?? 0);
  const second = Number(g.second ?? 0);
  const ms = Number((g.frac ?? "").padEnd(3, "0").slice(0, 3));

  if (year < 1) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const hasOffset = g.zulu !== undefined || g.sign !== undefined;
  const date = new Date(0);

  if (!hasOffset) {
    // setFullYear keeps years below 100 literal
    date.setFullYear(year, month - 1, day);
    date.setHours(hour, minute, second, ms);
    return date;
  }

  let offsetMinutes = 0;
  if (g.sign !== undefined) {
    const offHours = Number(g.offHour);
    const offMinutes = Number(g.offMinute);
    if (offHours > 23 || offMinutes > 59) return null;
    offsetMinutes = (g.sign === "-" ? -1 : 1) * (offHours * 60 + offMinutes);
  }

  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, ms);
  return new Date(date.getTime() - offsetMinutes * 60_000);
}

/** Canonical text for a structured timestamp: local wall-clock time, second precision. */
export function formatTimestamp(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
