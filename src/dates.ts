import { InvalidDateError, InvalidYearError } from './errors.js';
import type { CalendarDate } from './types.js';

export type DateInput = Date | CalendarDate | string;

export function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function formatDate(date: CalendarDate): string {
  return `${date.year}-${pad(date.month)}-${pad(date.day)}`;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * 年份必須是正整數，否則會寫出快取檔無法讀回的 key
 */
export function assertYear(year: number): number {
  if (!Number.isInteger(year) || year < 1) {
    throw new InvalidYearError(year);
  }
  return year;
}

function validate(date: CalendarDate, raw: string): CalendarDate {
  const { year, month, day } = date;
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    throw new InvalidDateError(raw);
  }
  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw new InvalidDateError(raw);
  }
  return { year, month, day };
}

/**
 * 轉成不含時區的年月日；Date 讀取本地時間欄位
 */
export function toCalendarDate(input: DateInput): CalendarDate {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new InvalidDateError(String(input));
    }
    return validate({ year: input.getFullYear(), month: input.getMonth() + 1, day: input.getDate() }, String(input));
  }

  if (typeof input === 'string') {
    const match = input.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) {
      throw new InvalidDateError(input);
    }
    return validate(
      {
        year: Number.parseInt(match[1], 10),
        month: Number.parseInt(match[2], 10),
        day: Number.parseInt(match[3], 10),
      },
      input,
    );
  }

  return validate(input, `${input.year}-${input.month}-${input.day}`);
}
