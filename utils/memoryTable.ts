// Types
import type { MealEntry, MealRow } from "utils/plan";
import type { MealPlanTable } from "utils/repository";

export interface MemoryTableFailures {
  select?: string;
  // Inserts succeed this many times, then fail with `insertError`.
  insertAfter?: number;
  insertError?: string;
  remove?: string;
}

export interface MemoryMealPlanTable extends MealPlanTable {
  readonly rows: MealEntry[];
  readonly failures: MemoryTableFailures;
}

/** In-process stand-in for the hosted meal plan table. */
export const createMemoryMealPlanTable = (
  initialRows: MealRow[] = [],
  failures: MemoryTableFailures = {}
): MemoryMealPlanTable => {
  let nextId = 1;
  let inserts = 0;
  const rows: MealEntry[] = initialRows.map((row) => ({ ...row, id: `row-${nextId++}` }));

  return {
    rows,
    failures,

    async selectAll() {
      if (failures.select) throw new Error(failures.select);
      return rows.map((row) => ({ ...row }));
    },

    async insert(row) {
      const { insertAfter, insertError = "insert failed" } = failures;
      if (insertAfter !== undefined && inserts >= insertAfter) {
        throw new Error(insertError);
      }
      inserts++;
      const entry: MealEntry = { ...row, id: `row-${nextId++}` };
      rows.push(entry);
      return { ...entry };
    },

    async remove(id) {
      if (failures.remove) throw new Error(failures.remove);
      const index = rows.findIndex((row) => row.id === id);
      if (index !== -1) rows.splice(index, 1);
    },
  };
};
