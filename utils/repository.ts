// Utils
import { errorMessage, logger as rootLogger, type Logger } from "utils/logger";
import { buildPlan, type MealEntry, type MealRow, type OperationResult, type Plan } from "utils/plan";

/** Hosted table holding one record per generated meal. */
export interface MealPlanTable {
  selectAll(): Promise<MealEntry[]>;
  insert(row: MealRow): Promise<MealEntry>;
  remove(id: string): Promise<void>;
}

export type ReplaceResult = OperationResult<"success" | "error">;

export class PlanRepository {
  private readonly logger: Logger;

  constructor(
    private readonly table: MealPlanTable,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child("repository");
  }

  /** Never rejects: a failed read is logged and comes back as an empty plan. */
  async load(): Promise<Plan> {
    try {
      const entries = await this.table.selectAll();
      this.logger.info("Loaded meal plan", { rows: entries.length });
      return buildPlan(entries, this.logger);
    } catch (error) {
      this.logger.error("Failed to load meal plan", error);
      return {};
    }
  }

  /**
   * Replaces every stored row with `rows`.
   *
   * New rows are staged before anything is removed. If staging fails the staged
   * rows are removed again and the previous plan is left in place; if removing
   * the previous rows fails the table holds both plans and the result is an error.
   */
  async replaceAll(rows: MealRow[]): Promise<ReplaceResult> {
    let previous: MealEntry[];
    try {
      previous = await this.table.selectAll();
    } catch (error) {
      this.logger.error("Failed to read existing meal plan", error);
      return { status: "error", message: `Failed to read existing meal plan: ${errorMessage(error)}` };
    }

    const staged: MealEntry[] = [];
    try {
      for (const row of rows) {
        staged.push(await this.table.insert(row));
      }
    } catch (error) {
      this.logger.error("Failed to insert meal plan rows", error);
      await this.removeAll(staged, "staged");
      return { status: "error", message: `Failed to insert meal plan rows: ${errorMessage(error)}` };
    }
    this.logger.info("Staged new meal plan", { rows: staged.length });

    const failed = await this.removeAll(previous, "previous");
    if (failed > 0) {
      return {
        status: "error",
        message: `Inserted ${staged.length} rows but failed to remove ${failed} previous rows`,
      };
    }

    this.logger.success("Replaced meal plan", { removed: previous.length, inserted: staged.length });
    return { status: "success", message: `Saved ${staged.length} meal plan rows` };
  }

  // Keeps going past individual failures and reports how many rows were left behind.
  private async removeAll(entries: MealEntry[], label: string): Promise<number> {
    let failed = 0;
    for (const entry of entries) {
      try {
        await this.table.remove(entry.id);
      } catch (error) {
        failed++;
        this.logger.error(`Failed to remove ${label} row`, { id: entry.id, message: errorMessage(error) });
      }
    }
    return failed;
  }
}
