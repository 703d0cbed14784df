const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const;

export const DEFAULT_TIME_ZONE = "Asia/Kolkata";

export function formatDateYYYYMMDD(date: Date, timeZone = DEFAULT_TIME_ZONE): string {
  // We use `formatToParts()` so we don't depend on locale-specific separators/order.
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).formatToParts(date);

  const year = parts.find((p) => p.type === "year")?.value;
  const month = parts.find((p) => p.type === "month")?.value;
  const day = parts.find((p) => p.type === "day")?.value;

  if (!year || !month || !day) {
    throw new Error(`Failed to format date (tz=${timeZone})`);
  }

  return `${year}-${month}-${day}`;
}

export function getTodayDateString(timeZone = DEFAULT_TIME_ZONE, now = new Date()): string {
  return formatDateYYYYMMDD(now, timeZone);
}

export function assertYYYYMMDD(date: string): void {
  if (!isIsoCalendarDate(date)) {
    throw new Error(`Expected a real calendar day as YYYY-MM-DD, got: ${date}`);
  }
}

export function parseIsoDate(date: string): Date {
  if (!ISO_DATE_RE.test(date)) {
    throw new Error(`Invalid date: ${date}. Expected YYYY-MM-DD.`);
  }

  const [yearStr, monthStr, dayStr] = date.split("-");
  const year = Number(yearStr);
  const month = Number(monthStr);
  const day = Number(dayStr);

  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    !Number.isFinite(parsed.getTime()) ||
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    throw new Error(`Invalid date: ${date}. Expected a real calendar day (YYYY-MM-DD).`);
  }

  return parsed;
}

export function isIsoCalendarDate(date: string): boolean {
  try {
    parseIsoDate(date);
    return true;
  } catch {
    return false;
  }
}

export function weekdayOf(date: string): string {
  return WEEKDAYS[parseIsoDate(date).getUTCDay()];
}

export function shiftIsoDate(date: string, days: number): string {
  const shifted = new Date(parseIsoDate(date).getTime() + days * 24 * 60 * 60 * 1000);
  return shifted.toISOString().slice(0, 10);
}
