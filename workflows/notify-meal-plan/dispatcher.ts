import { addDays } from "date-fns";
// Utils
import { logger as rootLogger, type Logger } from "utils/logger";
import { sendToRecipients, type MessagingClient } from "utils/messaging";
import { collectPrepItems, getPlanForDate, getWeekEntries, planEntries } from "utils/plan";
// Workflow
import { buildDailyMessage, buildMonthlyMessage, buildWeeklyMessage } from "./messages";
// Types
import type { OperationResult } from "utils/plan";
import type { PlanRepository } from "utils/repository";
import type { JobType } from "./config";

export interface DispatcherOptions {
  repository: Pick<PlanRepository, "load">;
  messaging: MessagingClient;
  recipients: string[];
  logger?: Logger;
}

export type DispatchResult = OperationResult<"success" | "warning">;

export class NotificationDispatcher {
  private readonly repository: Pick<PlanRepository, "load">;
  private readonly messaging: MessagingClient;
  private readonly recipients: string[];
  private readonly logger: Logger;

  constructor(options: DispatcherOptions) {
    this.repository = options.repository;
    this.messaging = options.messaging;
    this.recipients = options.recipients;
    this.logger = (options.logger ?? rootLogger).child("notify");
  }

  async sendDailyPlan(today: Date): Promise<DispatchResult> {
    const plan = await this.repository.load();
    const todayMeals = getPlanForDate(today, plan);

    if (!todayMeals.length) {
      return this.nothingToSend("No plan found for today.");
    }

    const tomorrowPreps = collectPrepItems(getPlanForDate(addDays(today, 1), plan));
    return this.send(buildDailyMessage(today, todayMeals, tomorrowPreps));
  }

  async sendWeeklyGroceries(today: Date): Promise<DispatchResult> {
    const plan = await this.repository.load();
    const groceries = collectPrepItems(getWeekEntries(today, plan));

    if (!groceries.length) {
      return this.nothingToSend("No groceries found for this week.");
    }
    return this.send(buildWeeklyMessage(groceries));
  }

  async sendMonthlyGroceries(): Promise<DispatchResult> {
    const plan = await this.repository.load();
    const groceries = collectPrepItems(planEntries(plan));

    if (!groceries.length) {
      return this.nothingToSend("No groceries found for this month.");
    }
    return this.send(buildMonthlyMessage(groceries));
  }

  run(job: JobType, today: Date): Promise<DispatchResult> {
    switch (job) {
      case "daily":
        return this.sendDailyPlan(today);
      case "weekly":
        return this.sendWeeklyGroceries(today);
      case "monthly":
        return this.sendMonthlyGroceries();
    }
  }

  private nothingToSend(message: string): DispatchResult {
    this.logger.alert(message);
    return { status: "warning", message };
  }

  private async send(body: string): Promise<DispatchResult> {
    const { sent, failed } = await sendToRecipients(this.messaging, this.recipients, body, this.logger);
    return {
      status: failed > 0 || sent === 0 ? "warning" : "success",
      message: `Sent to ${sent} recipient(s), ${failed} failed`,
    };
  }
}
