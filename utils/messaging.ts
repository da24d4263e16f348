import twilio from "twilio";
// Utils
import { errorMessage, logger as rootLogger, type Logger } from "utils/logger";

// Twilio's WhatsApp sandbox number.
export const SANDBOX_SENDER = "whatsapp:+14155238886";

export interface MessageRequest {
  body: string;
  from: string;
  to: string;
}

export interface MessagingClient {
  messages: {
    create: (request: MessageRequest) => Promise<{ sid: string }>;
  };
}

export interface SendSummary {
  sent: number;
  failed: number;
}

export const createMessagingClient = (accountSid: string, authToken: string): MessagingClient =>
  twilio(accountSid, authToken);

export const parseRecipients = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((number) => number.trim())
    .filter(Boolean);

export const toWhatsAppAddress = (number: string): string =>
  number.startsWith("whatsapp:") ? number : `whatsapp:${number}`;

/** Sends `body` unchanged to each recipient, one request per number. */
export const sendToRecipients = async (
  client: MessagingClient,
  recipients: string[],
  body: string,
  logger: Logger = rootLogger
): Promise<SendSummary> => {
  const summary: SendSummary = { sent: 0, failed: 0 };

  for (const recipient of recipients) {
    const number = recipient.trim();
    if (!number) continue;

    try {
      await client.messages.create({
        body,
        from: SANDBOX_SENDER,
        to: toWhatsAppAddress(number),
      });
      summary.sent++;
    } catch (error) {
      summary.failed++;
      logger.error("Failed to send WhatsApp message", { to: number, message: errorMessage(error) });
    }
  }

  logger.success(`WhatsApp message sent to ${summary.sent} recipient(s)`, { failed: summary.failed });
  return summary;
};
