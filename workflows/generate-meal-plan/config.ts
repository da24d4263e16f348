export const EXPORT_SHEET_NAME = "MealPlan";
export const DEFAULT_EXPORT_PATH = "meal_plan.xlsx";

export const EMPTY_PREFERENCES_MESSAGE = "Please enter your preferences before generating the plan.";
