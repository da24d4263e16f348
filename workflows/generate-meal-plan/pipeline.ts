// Utils
import { errorMessage, logger as rootLogger, type Logger } from "utils/logger";
import { parseMealRows } from "utils/parsing";
// Config
import { EMPTY_PREFERENCES_MESSAGE } from "./config";
// Types
import type { MealRow, OperationResult } from "utils/plan";
import type { PlanExporter } from "./exporter";
import type { PlanGenerator } from "./generator";

export interface GenerationDeps {
  generator: PlanGenerator;
  exporter: PlanExporter;
  logger?: Logger;
}

// Generate, parse and export. Failures come back as an error result.
export const runGeneration = async (
  { generator, exporter, logger = rootLogger }: GenerationDeps,
  preferences: string
): Promise<OperationResult> => {
  if (!preferences.trim()) {
    return { status: "error", message: EMPTY_PREFERENCES_MESSAGE };
  }

  let rawText: string;
  try {
    rawText = await generator.generate(preferences);
  } catch (error) {
    logger.error("Meal plan generation failed", error);
    return { status: "error", message: `Meal plan generation failed: ${errorMessage(error)}` };
  }

  let rows: MealRow[];
  try {
    rows = parseMealRows(rawText, logger);
  } catch (error) {
    logger.error("Could not parse generated meal plan", error);
    return { status: "error", message: `Could not parse generated meal plan: ${errorMessage(error)}` };
  }

  // Exporting nothing would wipe the stored plan.
  if (!rows.length) {
    logger.alert("Generated meal plan contained no rows");
    return { status: "error", message: "Generated meal plan contained no rows" };
  }

  logger.info("Parsed meal plan", { rows: rows.length });
  return exporter.exportPlan(rows);
};
