import { parse } from "csv-parse/sync";
// Utils
import { errorMessage, logger as rootLogger, type Logger } from "utils/logger";
// Types
import type { MealRow } from "utils/plan";

export const MEAL_COLUMNS = ["date", "meal_type", "item", "method", "prep", "quantity"] as const;

export type MealColumn = (typeof MEAL_COLUMNS)[number];

const COLUMN_FIELDS: Record<MealColumn, keyof MealRow> = {
  date: "date",
  meal_type: "mealType",
  item: "item",
  method: "method",
  prep: "prep",
  quantity: "quantity",
};

const isStringMatrix = (value: unknown): value is string[][] =>
  Array.isArray(value) &&
  value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"));

const parseRecords = (text: string, relaxQuotes: boolean): string[][] => {
  const records: unknown = parse(text, {
    skip_empty_lines: true,
    trim: true,
    relax_quotes: relaxQuotes,
  });
  if (!isStringMatrix(records)) {
    throw new Error("CSV parser returned unexpected records");
  }
  return records;
};

export const normalizeHeader = (header: string[]): string[] =>
  header.map((name) => name.trim().toLowerCase());

const toMealRow = (header: string[], record: string[]): MealRow => {
  const row: MealRow = { date: "", mealType: "", item: "", method: "", prep: "", quantity: "" };
  for (const column of MEAL_COLUMNS) {
    const index = header.indexOf(column);
    row[COLUMN_FIELDS[column]] = index === -1 ? "" : (record[index] ?? "");
  }
  return row;
};

// Each line stands alone, so a broken quote cannot swallow the lines after it.
const parseLineByLine = (rawText: string, logger: Logger): MealRow[] => {
  let header: string[] | undefined;
  const rows: MealRow[] = [];

  rawText.split(/\r?\n/).forEach((text, index) => {
    if (!text.trim()) return;
    const line = index + 1;

    let fields: string[] | undefined;
    try {
      [fields] = parseRecords(text, true);
    } catch (error) {
      logger.warn("Skipping malformed CSV line", { line, error: errorMessage(error) });
      return;
    }
    if (!fields) return;

    if (!header) {
      header = fields;
      return;
    }

    if (fields.length !== header.length) {
      logger.warn("Skipping malformed CSV line", { line, expected: header.length, got: fields.length });
      return;
    }
    rows.push(toMealRow(normalizeHeader(header), fields));
  });

  return rows;
};

/**
 * Parses generated `date,meal_type,item,method,prep,quantity` text.
 *
 * A strict pass runs first. If it fails, every line is parsed on its own and
 * any line that fails to parse, or whose width differs from the header, is
 * dropped with a warning. Values are not validated.
 */
export const parseMealRows = (rawText: string, logger: Logger = rootLogger): MealRow[] => {
  if (!rawText.trim()) return [];

  let records: string[][];
  try {
    records = parseRecords(rawText, false);
  } catch (error) {
    logger.warn("Strict CSV parse failed, retrying line by line", { error: errorMessage(error) });
    return parseLineByLine(rawText, logger);
  }

  const [headerRecord, ...body] = records;
  if (!headerRecord) return [];
  const header = normalizeHeader(headerRecord);

  return body.map((record) => toMealRow(header, record));
};
