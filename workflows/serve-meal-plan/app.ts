import express, { type ErrorRequestHandler, type Express } from "express";
// Utils
import { logger as rootLogger, type Logger } from "utils/logger";
// Workflow
import { renderPage } from "./render";
import { buildPageView } from "./view";
// Config
import { EMPTY_PREFERENCES_MESSAGE } from "../generate-meal-plan/config";
// Types
import type { OperationResult } from "utils/plan";
import type { PlanRepository } from "utils/repository";

export interface ViewerDeps {
  repository: Pick<PlanRepository, "load">;
  generate: (preferences: string) => Promise<OperationResult>;
  now?: () => Date;
  logger?: Logger;
}

const firstString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

export const createViewerApp = ({ repository, generate, now = () => new Date(), logger = rootLogger }: ViewerDeps): Express => {
  const app = express();
  app.use(express.urlencoded({ extended: false }));

  app.get("/", async (req, res, next) => {
    try {
      const plan = await repository.load();
      const view = buildPageView({ plan, today: now(), selectedDate: firstString(req.query.date) });
      res.type("html").send(renderPage(view));
    } catch (error) {
      next(error);
    }
  });

  app.post("/generate", async (req, res, next) => {
    try {
      const preferences = firstString(req.body?.preferences) ?? "";

      let result: OperationResult;
      if (!preferences.trim()) {
        result = { status: "error", message: EMPTY_PREFERENCES_MESSAGE };
      } else {
        logger.info("Generation requested from viewer");
        result = await generate(preferences);
      }

      const plan = await repository.load();
      const view = buildPageView({ plan, today: now(), preferences, result });
      res.status(result.status === "error" ? 400 : 200).type("html").send(renderPage(view));
    } catch (error) {
      next(error);
    }
  });

  const handleError: ErrorRequestHandler = (error, _req, res, _next) => {
    logger.error("Viewer request failed", error);
    res.status(500).type("text").send("Could not load the meal plan");
  };
  app.use(handleError);

  return app;
};
