/**
 * RFC 1123 timestamps as written in `<Expiration>`:
 * `ddd, dd MMM yyyy HH:mm:ss GMT`, always UTC, seconds precision,
 * English names regardless of locale.
 */

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

const RFC1123 = /^(Sun|Mon|Tue|Wed|Thu|Fri|Sat), (\d{2}) (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) (\d{4}) (\d{2}):(\d{2}):(\d{2}) GMT$/;

/** The "never expires" instant, in epoch milliseconds. */
export const DEFAULT_EXPIRATION = Date.UTC(9999, 11, 31, 23, 59, 59);

/** {@link DEFAULT_EXPIRATION} as written on the wire. */
export const DEFAULT_EXPIRATION_STRING = 'Fri, 31 Dec 9999 23:59:59 GMT';

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** Build a UTC instant without the two-digit-year mapping of `Date.UTC`. */
function utc(year: number, month: number, day: number, hours: number, minutes: number, seconds: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(hours, minutes, seconds, 0);
  return date;
}

/** Whether `date` has a four-digit year (0001 to 9999) and can be written. */
export function isRepresentableDate(date: Date): boolean {
  if (Number.isNaN(date.getTime())) {
    return false;
  }
  const year = date.getUTCFullYear();
  return year >= 1 && year <= 9999;
}

/** Drop milliseconds; the wire format carries whole seconds. */
export function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

export function formatRfc1123(date: Date): string {
  const day = DAYS[date.getUTCDay()];
  const month = MONTHS[date.getUTCMonth()];
  return (
    `${day}, ${pad(date.getUTCDate(), 2)} ${month} ${pad(date.getUTCFullYear(), 4)} ` +
    `${pad(date.getUTCHours(), 2)}:${pad(date.getUTCMinutes(), 2)}:${pad(date.getUTCSeconds(), 2)} GMT`
  );
}

/**
 * Parse the exact form produced by {@link formatRfc1123}. Out-of-range
 * fields, impossible dates and a wrong day of week all yield `undefined`.
 */
export function parseRfc1123(text: string): Date | undefined {
  const match = RFC1123.exec(text);
  if (!match) {
    return undefined;
  }
  const [, dayName, dd, monthName, yyyy, hh, mm, ss] = match;
  const year = Number(yyyy);
  const month = MONTHS.findIndex((m) => m === monthName);
  const day = Number(dd);
  const hours = Number(hh);
  const minutes = Number(mm);
  const seconds = Number(ss);
  if (year < 1 || hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }
  const date = utc(year, month, day, hours, minutes, seconds);
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return undefined;
  }
  if (DAYS[date.getUTCDay()] !== dayName) {
    return undefined;
  }
  return date;
}
