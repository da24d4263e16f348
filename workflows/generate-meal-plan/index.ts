import 'dotenv/config';
import { parseArgs } from "node:util";
// Utils
import { createAIClient } from "utils/ai";
import { logger } from "utils/logger";
import { createNotionClient, createNotionMealPlanTable } from "utils/notion";
import { PlanRepository } from "utils/repository";
// Workflow
import { createPlanExporter } from "./exporter";
import { createPlanGenerator, loadPromptTemplate } from "./generator";
import { runGeneration } from "./pipeline";
// Config
import { DEFAULT_EXPORT_PATH } from "./config";

const NOTION_TOKEN = process.env.NOTION_TOKEN;
const DATABASE_ID = process.env.MEAL_PLAN_DATABASE_ID;
const GEMINI_API_KEY = process.env.GEMINI_API_KEY;
const EXPORT_PATH = process.env.MEAL_PLAN_EXPORT_PATH || DEFAULT_EXPORT_PATH;

if (!NOTION_TOKEN) {
  logger.error("NOTION_TOKEN is not defined");
  process.exit(1);
}

if (!DATABASE_ID) {
  logger.error("MEAL_PLAN_DATABASE_ID is not defined");
  process.exit(1);
}

if (!GEMINI_API_KEY) {
  logger.error("GEMINI_API_KEY is not defined");
  process.exit(1);
}

const { values } = parseArgs({
  options: {
    preferences: { type: "string", short: "p" },
  },
});

const preferences = values.preferences ?? process.env.MEAL_PREFERENCES ?? "";

const run = async () => {
  if (!preferences.trim()) {
    logger.error("No preferences given. Pass --preferences or set MEAL_PREFERENCES");
    process.exit(1);
  }

  const notion = createNotionClient(NOTION_TOKEN);
  const repository = new PlanRepository(
    createNotionMealPlanTable({ notion, databaseId: DATABASE_ID, token: NOTION_TOKEN })
  );

  const generator = createPlanGenerator({
    ai: await createAIClient(GEMINI_API_KEY),
    promptTemplate: await loadPromptTemplate(),
  });
  const exporter = createPlanExporter({ repository, exportPath: EXPORT_PATH });

  const result = await runGeneration({ generator, exporter }, preferences);

  if (result.status === "success") {
    logger.success(result.message);
  } else if (result.status === "warning") {
    logger.alert(result.message);
  } else {
    logger.error(result.message);
    process.exit(1);
  }
};

try {
  await run();
} catch (err) {
  logger.error("Unexpected error", err);
  process.exit(1);
}
