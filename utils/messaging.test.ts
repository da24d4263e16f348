import { describe, it, expect, vi } from "vitest";
import { createLogger } from "./logger";
import {
  parseRecipients,
  SANDBOX_SENDER,
  sendToRecipients,
  toWhatsAppAddress,
  type MessageRequest,
  type MessagingClient,
} from "./messaging";

const silent = createLogger({ silent: true });

describe("parseRecipients", () => {
  it("splits a comma separated list and drops blanks", () => {
    expect(parseRecipients(" +10000000001, ,+10000000002,")).toEqual(["+10000000001", "+10000000002"]);
  });

  it("is empty when unset", () => {
    expect(parseRecipients(undefined)).toEqual([]);
    expect(parseRecipients("")).toEqual([]);
  });
});

describe("toWhatsAppAddress", () => {
  it("prefixes bare numbers once", () => {
    expect(toWhatsAppAddress("+10000000001")).toBe("whatsapp:+10000000001");
    expect(toWhatsAppAddress("whatsapp:+10000000001")).toBe("whatsapp:+10000000001");
  });
});

describe("sendToRecipients", () => {
  it("sends the same body to every recipient from the sandbox sender", async () => {
    const create = vi.fn(async (_request: MessageRequest) => ({ sid: "SM-test" }));
    const client: MessagingClient = { messages: { create } };

    const summary = await sendToRecipients(client, ["+10000000001", "  ", "+10000000002"], "hello", silent);

    expect(summary).toEqual({ sent: 2, failed: 0 });
    expect(create.mock.calls.map(([request]) => request)).toEqual([
      { body: "hello", from: SANDBOX_SENDER, to: "whatsapp:+10000000001" },
      { body: "hello", from: SANDBOX_SENDER, to: "whatsapp:+10000000002" },
    ]);
  });

  it("keeps sending after one recipient fails", async () => {
    const create = vi.fn(async (request: MessageRequest) => {
      if (request.to.endsWith("1")) throw new Error("unverified number");
      return { sid: "SM-test" };
    });

    const summary = await sendToRecipients({ messages: { create } }, ["+10000000001", "+10000000002"], "hi", silent);

    expect(summary).toEqual({ sent: 1, failed: 1 });
    expect(create).toHaveBeenCalledTimes(2);
  });
});
