import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { format, getDaysInMonth } from "date-fns";
// Utils
import { DEFAULT_MODEL, generateText, type AIClient } from "utils/ai";
import { logger as rootLogger, type Logger } from "utils/logger";
// Config
import { EMPTY_PREFERENCES_MESSAGE } from "./config";

const __dirname = dirname(fileURLToPath(import.meta.url));

export class InvalidPreferencesError extends Error {
  constructor(message = EMPTY_PREFERENCES_MESSAGE) {
    super(message);
    this.name = "InvalidPreferencesError";
  }
}

export interface PlanGenerator {
  generate(preferences: string): Promise<string>;
}

export interface PlanGeneratorOptions {
  ai: AIClient;
  promptTemplate: string;
  model?: string;
  now?: () => Date;
  logger?: Logger;
}

export const loadPromptTemplate = async (): Promise<string> =>
  readFile(join(__dirname, "prompt.md"), "utf-8");

export const buildPrompt = (template: string, preferences: string, today: Date): string =>
  template
    .replaceAll("{{MONTH}}", format(today, "MMMM"))
    .replaceAll("{{YEAR}}", format(today, "yyyy"))
    .replaceAll("{{DAYS_IN_MONTH}}", String(getDaysInMonth(today)))
    .replaceAll("{{PREFERENCES}}", () => preferences.trim());

/**
 * Asks the model for this month's plan as CSV text.
 *
 * Makes exactly one request. The returned text has its code fences removed but
 * is otherwise unchecked.
 */
export const createPlanGenerator = ({
  ai,
  promptTemplate,
  model = DEFAULT_MODEL,
  now = () => new Date(),
  logger = rootLogger,
}: PlanGeneratorOptions): PlanGenerator => ({
  generate: async (preferences) => {
    if (!preferences.trim()) {
      throw new InvalidPreferencesError();
    }

    const prompt = buildPrompt(promptTemplate, preferences, now());
    logger.info("Requesting monthly meal plan", { model });

    const text = await generateText(ai, prompt, { model });
    logger.info("Received meal plan text", { characters: text.length });
    return text;
  },
});
