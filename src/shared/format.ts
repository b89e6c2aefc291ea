export const NOT_AVAILABLE = 'N/A';
export const UNKNOWN = 'unknown';
export const DEFAULT_TIME_ZONE = 'Asia/Shanghai';

/** A statistic that is either a non-negative integer or unavailable. */
export type Counter = number | typeof NOT_AVAILABLE;

export function isCount(value: Counter): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Seconds to `H:MM:SS`, or `M:SS` under an hour. Zero means unknown.
 */
export function formatDuration(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds <= 0) return NOT_AVAILABLE;

  const total = Math.floor(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  const ss = String(secs).padStart(2, '0');

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${ss}`;
  }
  return `${minutes}:${ss}`;
}

interface DateParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

function dateParts(date: Date, timeZone: string): DateParts {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '00';

  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour'),
    minute: get('minute'),
    second: get('second'),
  };
}

/** `YYYY-MM-DD HH:MM:SS` in the given time zone. */
export function formatDateTime(date: Date, timeZone: string = DEFAULT_TIME_ZONE): string {
  const p = dateParts(date, timeZone);
  return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}:${p.second}`;
}

/** `YYYYMMDD_HHMMSS`, used in generated file names. */
export function formatFileStamp(date: Date, timeZone: string = DEFAULT_TIME_ZONE): string {
  const p = dateParts(date, timeZone);
  return `${p.year}${p.month}${p.day}_${p.hour}${p.minute}${p.second}`;
}

export function formatTimestamp(epochSeconds: number, timeZone: string = DEFAULT_TIME_ZONE): string {
  if (!Number.isFinite(epochSeconds) || epochSeconds === 0) return UNKNOWN;
  const date = new Date(epochSeconds * 1000);
  if (Number.isNaN(date.getTime())) return UNKNOWN;
  return formatDateTime(date, timeZone);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Thousands-separated display form; non-numeric values pass through.
 */
export function formatNumber(value: Counter | string | null | undefined): string {
  if (value === null || value === undefined || value === NOT_AVAILABLE) return NOT_AVAILABLE;
  if (typeof value === 'string') {
    return /^\d+$/.test(value) ? Number(value).toLocaleString('en-US') : value;
  }
  return Number.isInteger(value) ? value.toLocaleString('en-US') : String(value);
}
