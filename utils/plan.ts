import { getMonth, getYear } from "date-fns";
// Utils
import { currentWeekKey, parseISODate, partitionDate, toISODate, type WeekKey } from "utils/dates";
import { logger as rootLogger, type Logger } from "utils/logger";

export const MEAL_TYPES = ["breakfast", "lunch", "dinner", "snack"] as const;

export type MealType = (typeof MEAL_TYPES)[number];

/**
 * One generated row, exactly as the model wrote it. Nothing here is validated:
 * `date` may not be a real date and `mealType` may be outside {@link MealType}.
 */
export interface MealRow {
  date: string;
  mealType: string;
  item: string;
  method: string;
  prep: string;
  quantity: string;
}

export interface MealEntry extends MealRow {
  id: string;
}

export type DayPlan = Record<string, MealEntry[]>;

export type Plan = Partial<Record<WeekKey, DayPlan>>;

export type OperationStatus = "success" | "warning" | "error";

export interface OperationResult<S extends OperationStatus = OperationStatus> {
  status: S;
  message: string;
}

export const isMealType = (value: string): value is MealType =>
  MEAL_TYPES.some((type) => type === value);

// Rows with an unreadable date cannot be bucketed and are dropped.
export const buildPlan = (entries: MealEntry[], logger: Logger = rootLogger): Plan => {
  const plan: Plan = {};

  for (const entry of entries) {
    const date = parseISODate(entry.date);
    if (!date) {
      logger.warn("Skipping meal with invalid date", { id: entry.id, date: entry.date });
      continue;
    }

    if (!isMealType(entry.mealType.trim().toLowerCase())) {
      logger.debug("Unrecognized meal type", { id: entry.id, mealType: entry.mealType });
    }

    const { weekKey, dayKey } = partitionDate(date);
    const week = (plan[weekKey] ??= {});
    (week[dayKey] ??= []).push(entry);
  }

  return plan;
};

export const planEntries = (plan: Plan): MealEntry[] =>
  Object.values(plan).flatMap((week) => (week ? Object.values(week).flat() : []));

export const isPlanEmpty = (plan: Plan): boolean => planEntries(plan).length === 0;

/**
 * Entries stored for one calendar day.
 *
 * The week/day bucket alone would also hold the same weekday slot of any other
 * month, so entries are matched on their stored date as well.
 */
export const getPlanForDate = (date: Date, plan: Plan): MealEntry[] => {
  const { weekKey, dayKey } = partitionDate(date);
  const isoDate = toISODate(date);
  const bucket = plan[weekKey]?.[dayKey] ?? [];
  return bucket.filter((entry) => entry.date.trim() === isoDate);
};

export const getWeekEntries = (today: Date, plan: Plan): MealEntry[] => {
  const week = plan[currentWeekKey(today)];
  if (!week) return [];

  return Object.values(week)
    .flat()
    .filter((entry) => {
      const date = parseISODate(entry.date);
      return date !== null && getMonth(date) === getMonth(today) && getYear(date) === getYear(today);
    });
};

export const collectPrepItems = (entries: MealEntry[]): string[] =>
  entries.map((entry) => entry.prep.trim()).filter(Boolean);
