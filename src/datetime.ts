/**
 * Calendar and clock value objects for date/time values. Local values carry
 * no zone; offset values keep the offset exactly as written.
 */

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function checkRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} out of range [${min}, ${max}]: ${value}`);
  }
}

export class LocalDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;

  constructor(year: number, month: number, day: number) {
    checkRange('Year', year, 0, 9999);
    checkRange('Month', month, 1, 12);
    const monthLength = month === 2 && isLeapYear(year) ? 29 : (DAYS_IN_MONTH[month - 1] ?? 31);
    checkRange('Day', day, 1, monthLength);
    this.year = year;
    this.month = month;
    this.day = day;
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month)}-${pad(this.day)}`;
  }
}

export class LocalTime {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly nanosecond: number;

  constructor(hour: number, minute: number, second = 0, nanosecond = 0) {
    checkRange('Hour', hour, 0, 23);
    checkRange('Minute', minute, 0, 59);
    checkRange('Second', second, 0, 59);
    checkRange('Nanosecond', nanosecond, 0, 999_999_999);
    this.hour = hour;
    this.minute = minute;
    this.second = second;
    this.nanosecond = nanosecond;
  }

  toString(): string {
    const base = `${pad(this.hour)}:${pad(this.minute)}:${pad(this.second)}`;
    if (this.nanosecond === 0) {
      return base;
    }
    return `${base}.${pad(this.nanosecond, 9).replace(/0+$/, '')}`;
  }
}

export class ZoneOffset {
  static readonly MAX_MINUTES = 23 * 60 + 59;
  static readonly UTC = new ZoneOffset(0);

  /** Signed distance from UTC, in minutes. */
  readonly totalMinutes: number;

  constructor(totalMinutes: number) {
    checkRange('Offset', totalMinutes, -ZoneOffset.MAX_MINUTES, ZoneOffset.MAX_MINUTES);
    this.totalMinutes = totalMinutes;
  }

  static of(hours: number, minutes = 0): ZoneOffset {
    checkRange('Offset minutes', Math.abs(minutes), 0, 59);
    const sign = hours < 0 || Object.is(hours, -0) ? -1 : 1;
    return new ZoneOffset(sign * (Math.abs(hours) * 60 + Math.abs(minutes)));
  }

  toString(): string {
    if (this.totalMinutes === 0) {
      return 'Z';
    }
    const sign = this.totalMinutes < 0 ? '-' : '+';
    const magnitude = Math.abs(this.totalMinutes);
    return `${sign}${pad(Math.floor(magnitude / 60))}:${pad(magnitude % 60)}`;
  }
}

export class LocalDateTime {
  readonly date: LocalDate;
  readonly time: LocalTime;

  constructor(date: LocalDate, time: LocalTime) {
    this.date = date;
    this.time = time;
  }

  toString(): string {
    return `${this.date.toString()}T${this.time.toString()}`;
  }
}

export class OffsetDateTime {
  readonly date: LocalDate;
  readonly time: LocalTime;
  readonly offset: ZoneOffset;

  constructor(date: LocalDate, time: LocalTime, offset: ZoneOffset) {
    this.date = date;
    this.time = time;
    this.offset = offset;
  }

  /**
   * The instant this value denotes. Sub-millisecond precision is dropped.
   */
  toDate(): Date {
    const utc = Date.UTC(
      this.date.year,
      this.date.month - 1,
      this.date.day,
      this.time.hour,
      this.time.minute,
      this.time.second,
      Math.floor(this.time.nanosecond / 1_000_000),
    );
    // Date.UTC maps years 0-99 onto 1900-1999
    const fixed = new Date(utc);
    fixed.setUTCFullYear(this.date.year);
    return new Date(fixed.getTime() - this.offset.totalMinutes * 60_000);
  }

  toString(): string {
    return `${this.date.toString()}T${this.time.toString()}${this.offset.toString()}`;
  }
}

export class OffsetTime {
  readonly time: LocalTime;
  readonly offset: ZoneOffset;

  constructor(time: LocalTime, offset: ZoneOffset) {
    this.time = time;
    this.offset = offset;
  }

  toString(): string {
    return `${this.time.toString()}${this.offset.toString()}`;
  }
}

/**
 * The host's UTC offset in effect at a local date and time. A wall time that
 * falls in a daylight saving gap or overlap takes the offset in effect before
 * the transition.
 */
export function systemOffsetAt(date: LocalDate, time: LocalTime): ZoneOffset {
  const local = new Date(2000, 0, 1);
  local.setFullYear(date.year, date.month - 1, date.day);
  local.setHours(time.hour, time.minute, time.second, 0);
  const wall = new Date(0);
  wall.setUTCFullYear(date.year, date.month - 1, date.day);
  wall.setUTCHours(time.hour, time.minute, time.second, 0);
  // Date reads an ambiguous or skipped wall time with the earlier offset
  return new ZoneOffset(Math.round((wall.getTime() - local.getTime()) / 60_000) || 0);
}
