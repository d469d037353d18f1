const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const TIME_ONLY = /^\d{2}:\d{2}:\d{2}$/;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}/;

export function isRecognizedTimeFormat(value: string): boolean {
  return DATE_ONLY.test(value) || TIME_ONLY.test(value) || DATE_TIME.test(value);
}

/**
 * Formats a UTC offset in minutes east of UTC as `+08` or `+05:30`.
 */
export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const absolute = Math.abs(offsetMinutes);
  const hours = String(Math.floor(absolute / 60)).padStart(2, "0");
  const minutes = absolute % 60;
  return minutes > 0
    ? `${sign}${hours}:${String(minutes).padStart(2, "0")}`
    : `${sign}${hours}`;
}

export function localUtcOffset(now: Date): string {
  // getTimezoneOffset() is minutes *behind* UTC
  return formatUtcOffset(-now.getTimezoneOffset());
}

export function localDate(now: Date): string {
  const year = String(now.getFullYear()).padStart(4, "0");
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Expands a bare date to local midnight and a bare time to today, both with
 * the local UTC offset. Values that already carry a date and a time are
 * returned unchanged, so the function is idempotent.
 */
export function normalizeTime(value: string, now: Date = new Date()): string {
  if (!value) {
    return "";
  }

  if (DATE_ONLY.test(value)) {
    return `${value} 00:00:00${localUtcOffset(now)}`;
  }

  if (TIME_ONLY.test(value)) {
    return `${localDate(now)} ${value}${localUtcOffset(now)}`;
  }

  return value;
}
