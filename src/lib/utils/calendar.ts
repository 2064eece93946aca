import type { IsoDate, WeekdayName } from "@/types/progress";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const WEEKDAY_NAMES: readonly WeekdayName[] = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday"
] as const;

export function isIsoDate(value: string): boolean {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    return false;
  }

  const date = toUtcDate(value);
  return !Number.isNaN(date.getTime()) && formatIsoDate(date) === value;
}

export function toUtcDate(value: IsoDate): Date {
  const [year, month, day] = value.split("-").map((part) => Number(part));
  return new Date(Date.UTC(year, month - 1, day));
}

export function formatIsoDate(date: Date): IsoDate {
  const year = String(date.getUTCFullYear()).padStart(4, "0");
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function todayIsoDate(now: Date = new Date()): IsoDate {
  return formatIsoDate(now);
}

export function addDays(value: IsoDate, days: number): IsoDate {
  return formatIsoDate(new Date(toUtcDate(value).getTime() + days * MS_PER_DAY));
}

export function monthKey(value: IsoDate): string {
  return value.slice(0, 7);
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** 1 = Monday ... 7 = Sunday */
export function isoWeekday(value: IsoDate): number {
  const jsDay = toUtcDate(value).getUTCDay();
  return jsDay === 0 ? 7 : jsDay;
}

export function weekdayName(value: IsoDate): WeekdayName {
  return WEEKDAY_NAMES[isoWeekday(value) - 1];
}

export function isoWeek(value: IsoDate): { isoYear: number; week: number } {
  const date = toUtcDate(value);
  // Thursday of the same ISO week decides the ISO year.
  const thursday = new Date(date.getTime() + (4 - isoWeekday(value)) * MS_PER_DAY);
  const isoYear = thursday.getUTCFullYear();
  const yearStart = Date.UTC(isoYear, 0, 1);
  const week = Math.floor((thursday.getTime() - yearStart) / MS_PER_DAY / 7) + 1;
  return { isoYear, week };
}

export function isoWeeksInYear(isoYear: number): number {
  return isoWeek(`${String(isoYear).padStart(4, "0")}-12-28`).week;
}

export function eachDateOfYear(year: number): IsoDate[] {
  const start = `${String(year).padStart(4, "0")}-01-01`;
  const total = year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0) ? 366 : 365;
  return Array.from({ length: total }, (_, index) => addDays(start, index));
}
