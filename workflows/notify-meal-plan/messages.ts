import { formatLongDate } from "utils/dates";
// Types
import type { MealEntry } from "utils/plan";

const capitalize = (value: string): string =>
  value ? value.charAt(0).toUpperCase() + value.slice(1).toLowerCase() : value;

const orFallback = (value: string, fallback = "N/A"): string => value.trim() || fallback;

export const formatMeal = (meal: MealEntry): string => {
  let text = `🍽 ${capitalize(meal.mealType.trim())}: ${orFallback(meal.item)}\n📋 Method: ${orFallback(meal.method)}`;
  if (meal.prep.trim()) {
    text += `\n🛠 Prep: ${meal.prep.trim()}`;
  }
  return text;
};

export const buildDailyMessage = (today: Date, todayMeals: MealEntry[], tomorrowPreps: string[]): string => {
  const lines = [`🥗 *Today's Plan* (${formatLongDate(today)})`, ...todayMeals.map(formatMeal)];

  if (tomorrowPreps.length) {
    lines.push(`🌙 *Evening Prep for Tomorrow*: ${tomorrowPreps.join(", ")}`);
  }

  return lines.join("\n\n");
};

const buildList = (title: string, items: string[]): string =>
  `${title}\n${items.map((item) => `- ${item}`).join("\n")}`;

export const buildWeeklyMessage = (items: string[]): string => buildList("🛒 *Weekly Grocery List*", items);

export const buildMonthlyMessage = (items: string[]): string => buildList("📦 *Monthly Grocery List*", items);
