import 'dotenv/config';
import { parseArgs } from "node:util";
// Utils
import { logger } from "utils/logger";
import { createMessagingClient, parseRecipients } from "utils/messaging";
import { createNotionClient, createNotionMealPlanTable } from "utils/notion";
import { PlanRepository } from "utils/repository";
// Workflow
import { NotificationDispatcher } from "./dispatcher";
// Config
import { isJobType, JOB_TYPES } from "./config";

const { values } = parseArgs({
  options: {
    job: { type: "string", short: "j" },
  },
});

// Checked before any credentials so a bad selector never reaches a service.
const job = values.job;
if (!isJobType(job)) {
  logger.error(`Invalid job type. Use: ${JOB_TYPES.join(" | ")}`, { job: job ?? null });
  process.exit(1);
}

const NOTION_TOKEN = process.env.NOTION_TOKEN;
const DATABASE_ID = process.env.MEAL_PLAN_DATABASE_ID;
const TWILIO_ACCOUNT_SID = process.env.TWILIO_ACCOUNT_SID;
const TWILIO_AUTH_TOKEN = process.env.TWILIO_AUTH_TOKEN;
const RECIPIENTS = parseRecipients(process.env.RECIPIENTS);

if (!NOTION_TOKEN) {
  logger.error("NOTION_TOKEN is not defined");
  process.exit(1);
}

if (!DATABASE_ID) {
  logger.error("MEAL_PLAN_DATABASE_ID is not defined");
  process.exit(1);
}

if (!TWILIO_ACCOUNT_SID) {
  logger.error("TWILIO_ACCOUNT_SID is not defined");
  process.exit(1);
}

if (!TWILIO_AUTH_TOKEN) {
  logger.error("TWILIO_AUTH_TOKEN is not defined");
  process.exit(1);
}

if (!RECIPIENTS.length) {
  logger.warn("RECIPIENTS is empty, messages will not be delivered to anyone");
}

const run = async () => {
  const notion = createNotionClient(NOTION_TOKEN);
  const dispatcher = new NotificationDispatcher({
    repository: new PlanRepository(
      createNotionMealPlanTable({ notion, databaseId: DATABASE_ID, token: NOTION_TOKEN })
    ),
    messaging: createMessagingClient(TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN),
    recipients: RECIPIENTS,
  });

  logger.info(`Running ${job} notification`);
  const result = await dispatcher.run(job, new Date());
  logger.info(result.message, { job, status: result.status });
};

try {
  await run();
} catch (err) {
  logger.error("Unexpected error", err);
  process.exit(1);
}
