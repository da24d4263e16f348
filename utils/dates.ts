import { format, getDate, isValid, parse } from "date-fns";

export type WeekKey = `week${number}`;

export interface DatePartition {
  weekKey: WeekKey;
  dayKey: string;
}

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// Buckets by day of month, not calendar week: week5 only ever holds days 29-31.
export const weekOfMonth = (date: Date): number =>
  Math.floor((getDate(date) - 1) / 7) + 1;

export const partitionDate = (date: Date): DatePartition => ({
  weekKey: `week${weekOfMonth(date)}`,
  dayKey: format(date, "EEEE").toLowerCase(),
});

export const currentWeekKey = (today: Date): WeekKey => partitionDate(today).weekKey;

// Local calendar date, so a midnight Date never slips a day through UTC.
export const toISODate = (date: Date): string => format(date, "yyyy-MM-dd");

export const parseISODate = (text: string): Date | null => {
  const trimmed = text.trim();
  if (!ISO_DATE_PATTERN.test(trimmed)) return null;

  const date = parse(trimmed, "yyyy-MM-dd", new Date());
  return isValid(date) ? date : null;
};

export const formatLongDate = (date: Date): string => format(date, "dd MMMM yyyy");

export const formatWeekdayDate = (date: Date): string => format(date, "EEEE, dd MMMM yyyy");
