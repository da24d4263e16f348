import ExcelJS from "exceljs";
// Utils
import { errorMessage, logger as rootLogger, type Logger } from "utils/logger";
import { MEAL_COLUMNS, type MealColumn } from "utils/parsing";
// Config
import { EXPORT_SHEET_NAME } from "./config";
// Types
import type { MealRow, OperationResult } from "utils/plan";
import type { PlanRepository } from "utils/repository";

export interface PlanExporter {
  exportPlan(rows: MealRow[]): Promise<OperationResult>;
}

export interface PlanExporterOptions {
  repository: Pick<PlanRepository, "replaceAll">;
  exportPath: string;
  logger?: Logger;
}

const toSheetRecord = (row: MealRow): Record<MealColumn, string> => ({
  date: row.date,
  meal_type: row.mealType,
  item: row.item,
  method: row.method,
  prep: row.prep,
  quantity: row.quantity,
});

export const writeSpreadsheet = async (rows: MealRow[], path: string): Promise<void> => {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(EXPORT_SHEET_NAME);
  sheet.columns = MEAL_COLUMNS.map((column) => ({ header: column, key: column }));
  sheet.addRows(rows.map(toSheetRecord));
  await workbook.xlsx.writeFile(path);
};

/**
 * Writes the local spreadsheet, then replaces the stored plan.
 *
 * `warning` means the file was written but the repository was not updated.
 */
export const createPlanExporter = ({
  repository,
  exportPath,
  logger = rootLogger,
}: PlanExporterOptions): PlanExporter => ({
  exportPlan: async (rows) => {
    try {
      await writeSpreadsheet(rows, exportPath);
      logger.success("Wrote meal plan spreadsheet", { path: exportPath, rows: rows.length });
    } catch (error) {
      logger.error("Failed to write meal plan spreadsheet", error);
      return { status: "error", message: `Failed to write ${exportPath}: ${errorMessage(error)}` };
    }

    const result = await repository.replaceAll(rows);
    if (result.status === "error") {
      logger.alert("Spreadsheet written but repository update failed", { message: result.message });
      return {
        status: "warning",
        message: `Saved ${exportPath} but failed to update the meal plan table: ${result.message}`,
      };
    }

    return { status: "success", message: `Saved ${rows.length} meals to ${exportPath} and the meal plan table` };
  },
});
