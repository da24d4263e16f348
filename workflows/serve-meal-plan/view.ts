import { addDays } from "date-fns";
// Utils
import { parseISODate, toISODate } from "utils/dates";
import { collectPrepItems, getPlanForDate, isPlanEmpty } from "utils/plan";
// Types
import type { MealEntry, OperationResult, Plan } from "utils/plan";

export type EveningPrep =
  | { kind: "prep"; items: string[] }
  | { kind: "none" }
  | { kind: "end-of-plan" };

export interface DayView {
  date: Date;
  isoDate: string;
  meals: MealEntry[];
  eveningPrep: EveningPrep;
}

export interface PageView {
  hasPlan: boolean;
  today: DayView;
  selected: DayView;
  preferences: string;
  result?: OperationResult;
}

export interface PageViewInput {
  plan: Plan;
  today: Date;
  selectedDate?: string;
  preferences?: string;
  result?: OperationResult;
}

// Evening prep for a day is whatever the following day's meals need.
export const buildDayView = (date: Date, plan: Plan): DayView => {
  const tomorrow = getPlanForDate(addDays(date, 1), plan);
  const prepItems = collectPrepItems(tomorrow);

  let eveningPrep: EveningPrep;
  if (!tomorrow.length) {
    eveningPrep = { kind: "end-of-plan" };
  } else if (!prepItems.length) {
    eveningPrep = { kind: "none" };
  } else {
    eveningPrep = { kind: "prep", items: prepItems };
  }

  return {
    date,
    isoDate: toISODate(date),
    meals: getPlanForDate(date, plan),
    eveningPrep,
  };
};

export const buildPageView = ({ plan, today, selectedDate, preferences = "", result }: PageViewInput): PageView => {
  const selected = (selectedDate && parseISODate(selectedDate)) || today;

  return {
    hasPlan: !isPlanEmpty(plan),
    today: buildDayView(today, plan),
    selected: buildDayView(selected, plan),
    preferences,
    result,
  };
};
