import 'dotenv/config';
// Utils
import { createAIClient } from "utils/ai";
import { logger } from "utils/logger";
import { createNotionClient, createNotionMealPlanTable } from "utils/notion";
import { PlanRepository } from "utils/repository";
// Workflows
import { createPlanExporter } from "../generate-meal-plan/exporter";
import { createPlanGenerator, loadPromptTemplate } from "../generate-meal-plan/generator";
import { runGeneration } from "../generate-meal-plan/pipeline";
import { createViewerApp } from "./app";
// Config
import { DEFAULT_EXPORT_PATH } from "../generate-meal-plan/config";

const NOTION_TOKEN = process.env.NOTION_TOKEN;
const DATABASE_ID = process.env.MEAL_PLAN_DATABASE_ID;
const GEMINI_API_KEY = process.env.GEMINI_API_KEY;
const EXPORT_PATH = process.env.MEAL_PLAN_EXPORT_PATH || DEFAULT_EXPORT_PATH;
const PORT = Number(process.env.PORT) || 3000;

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

const run = async () => {
  const notion = createNotionClient(NOTION_TOKEN);
  const repository = new PlanRepository(
    createNotionMealPlanTable({ notion, databaseId: DATABASE_ID, token: NOTION_TOKEN })
  );
  const generator = createPlanGenerator({
    ai: await createAIClient(GEMINI_API_KEY),
    promptTemplate: await loadPromptTemplate(),
  });
  const exporter = createPlanExporter({ repository, exportPath: EXPORT_PATH });

  const app = createViewerApp({
    repository,
    generate: (preferences) => runGeneration({ generator, exporter }, preferences),
  });

  app
    .listen(PORT, () => {
      logger.info(`Meal planner viewer listening on http://localhost:${PORT}`);
    })
    .on("error", (err) => {
      logger.error("Server failed", err);
      process.exit(1);
    });
};

try {
  await run();
} catch (err) {
  logger.error("Unexpected error", err);
  process.exit(1);
}
