const WEEKDAY_LABELS = ['日', '一', '二', '三', '四', '五', '六'] as const;

export interface LocalDateTime {
  /** YYYY-MM-DD */
  date: string;
  hour: number;
  minute: number;
}

/** Wall-clock date and time of `instant` in the given IANA timezone. */
export function toLocalDateTime(instant: Date, timeZone: string): LocalDateTime {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(instant);

  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? '00';

  return {
    date: `${pick('year')}-${pick('month')}-${pick('day')}`,
    hour: Number(pick('hour')),
    minute: Number(pick('minute')),
  };
}

function dateKeyToUtc(dateKey: string): Date {
  const [year, month, day] = dateKey.split('-').map(Number);
  return new Date(Date.UTC(year ?? 1970, (month ?? 1) - 1, day ?? 1));
}

/** 0 = Sunday … 6 = Saturday, independent of host timezone. */
export function weekdayOf(dateKey: string): number {
  return dateKeyToUtc(dateKey).getUTCDay();
}

export function weekdayLabel(dateKey: string): string {
  return WEEKDAY_LABELS[weekdayOf(dateKey)] ?? '';
}

export function isWeekendDate(dateKey: string): boolean {
  const day = weekdayOf(dateKey);
  return day === 0 || day === 6;
}

export function addDays(dateKey: string, days: number): string {
  const date = dateKeyToUtc(dateKey);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

/** e.g. `2025年7月19日 (六)` */
export function formatDateLabel(dateKey: string): string {
  const date = dateKeyToUtc(dateKey);
  return `${date.getUTCFullYear()}年${date.getUTCMonth() + 1}月${date.getUTCDate()}日 (${weekdayLabel(dateKey)})`;
}

/** `今天` / `明天` relative to `todayKey`, otherwise `MM/DD`. */
export function relativeDayLabel(dateKey: string, todayKey?: string): string {
  if (todayKey) {
    if (dateKey === todayKey) return '今天';
    if (dateKey === addDays(todayKey, 1)) return '明天';
  }
  return `${dateKey.slice(5, 7)}/${dateKey.slice(8, 10)}`;
}

/**
 * Parses a CWA local timestamp (`2025-07-19 06:00:00` or
 * `2025-07-19T06:00:00+08:00`) into its date key and hour without shifting
 * timezones.
 */
export function splitLocalTimestamp(timestamp: string): { date: string; hour: number } | null {
  const match = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}):\d{2}/.exec(timestamp);
  if (!match || match[1] === undefined || match[2] === undefined) return null;
  return { date: match[1], hour: Number(match[2]) };
}

/**
 * Adds whole hours to a CWA local timestamp, keeping its wall clock
 * (Taiwan has no DST). Returns `YYYY-MM-DD HH:MM`.
 */
export function addHoursToLocalTimestamp(timestamp: string, hours: number): string | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})/.exec(timestamp);
  if (!match) return null;
  const [, year, month, day, hour, minute] = match.map(Number);
  if (year === undefined || month === undefined || day === undefined || hour === undefined || minute === undefined) {
    return null;
  }
  const shifted = new Date(Date.UTC(year, month - 1, day, hour + hours, minute));
  return shifted.toISOString().slice(0, 16).replace('T', ' ');
}
