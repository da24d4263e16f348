import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger } from "./logger";
import { normalizeHeader, parseMealRows } from "./parsing";

const silent = createLogger({ silent: true });

const HEADER = "date,meal_type,item,method,prep,quantity";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseMealRows", () => {
  it("parses well-formed CSV into rows in order", () => {
    const text = [
      HEADER,
      "2024-03-01,breakfast,Poha,Steam and temper,Rinse poha,1 bowl",
      "2024-03-01,lunch,Dal tadka,Pressure cook,,1 cup",
    ].join("\n");

    expect(parseMealRows(text, silent)).toEqual([
      {
        date: "2024-03-01",
        mealType: "breakfast",
        item: "Poha",
        method: "Steam and temper",
        prep: "Rinse poha",
        quantity: "1 bowl",
      },
      { date: "2024-03-01", mealType: "lunch", item: "Dal tadka", method: "Pressure cook", prep: "", quantity: "1 cup" },
    ]);
  });

  it("drops only the malformed line", () => {
    const text = [
      HEADER,
      "2024-03-01,breakfast,Poha,Steam,Rinse poha,1 bowl",
      "2024-03-01,lunch,Dal",
      "2024-03-02,breakfast,Upma,Roast,Roast semolina,1 plate",
    ].join("\n");

    const rows = parseMealRows(text, silent);

    expect(rows.map((row) => row.item)).toEqual(["Poha", "Upma"]);
    expect(rows[1]).toEqual({
      date: "2024-03-02",
      mealType: "breakfast",
      item: "Upma",
      method: "Roast",
      prep: "Roast semolina",
      quantity: "1 plate",
    });
  });

  it("keeps the lines around one with an unclosed quote", () => {
    const text = [
      HEADER,
      "2024-03-01,breakfast,Poha,Steam,Rinse poha,1 bowl",
      '2024-03-01,lunch,"Dal tadka,Pressure cook,,1 cup',
      "2024-03-02,breakfast,Upma,Roast,Roast semolina,1 plate",
    ].join("\n");

    expect(parseMealRows(text, silent).map((row) => row.item)).toEqual(["Poha", "Upma"]);
  });

  it("drops both halves of a quoted value broken across lines", () => {
    const text = [
      HEADER,
      "2024-03-01,breakfast,Poha,Steam,Rinse poha,1 bowl",
      '2024-03-01,lunch,"Dal tadka',
      'with"ghee,Pressure cook,,1 cup',
      "2024-03-02,breakfast,Upma,Roast,Roast semolina,1 plate",
    ].join("\n");

    expect(parseMealRows(text, silent).map((row) => row.item)).toEqual(["Poha", "Upma"]);
  });

  it("warns with the line number of each skipped line", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const text = [HEADER, "2024-03-01,breakfast,Poha,Steam,Rinse poha,1 bowl", '2024-03-01,lunch,"Dal'].join("\n");

    parseMealRows(text, createLogger({ level: "warn" }));

    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/Skipping malformed CSV line \{"line":3,/));
  });

  it("normalizes column names and ignores unknown columns", () => {
    const text = [" Date ,MEAL_TYPE,Item,Method,Prep,Quantity,Calories", "2024-03-03,dinner,Khichdi,Simmer,,1 bowl,350"].join(
      "\n"
    );

    expect(parseMealRows(text, silent)).toEqual([
      { date: "2024-03-03", mealType: "dinner", item: "Khichdi", method: "Simmer", prep: "", quantity: "1 bowl" },
    ]);
  });

  it("fills missing columns with empty strings", () => {
    const text = ["date,meal_type,item", "2024-03-04,snack,Roasted chana"].join("\n");

    expect(parseMealRows(text, silent)).toEqual([
      { date: "2024-03-04", mealType: "snack", item: "Roasted chana", method: "", prep: "", quantity: "" },
    ]);
  });

  it("keeps quoted commas inside a value", () => {
    const text = [HEADER, '2024-03-05,dinner,"Rajma, rice",Pressure cook,"Soak rajma, overnight",1 plate'].join("\n");

    const [row] = parseMealRows(text, silent);
    expect(row.item).toBe("Rajma, rice");
    expect(row.prep).toBe("Soak rajma, overnight");
  });

  it("does not validate dates or meal types", () => {
    const text = [HEADER, "someday,brunch,Idli,Steam,Soak rice,3 pieces"].join("\n");

    expect(parseMealRows(text, silent)[0]).toMatchObject({ date: "someday", mealType: "brunch" });
  });

  it("ignores blank lines and returns nothing for empty input", () => {
    expect(parseMealRows("", silent)).toEqual([]);
    expect(parseMealRows("   \n", silent)).toEqual([]);
    expect(parseMealRows(`${HEADER}\n\n2024-03-06,lunch,Curd rice,Mix,,1 bowl\n\n`, silent)).toHaveLength(1);
    expect(parseMealRows(HEADER, silent)).toEqual([]);
  });
});

describe("normalizeHeader", () => {
  it("trims and lower-cases names", () => {
    expect(normalizeHeader([" Meal_Type ", "DATE"])).toEqual(["meal_type", "date"]);
  });
});
