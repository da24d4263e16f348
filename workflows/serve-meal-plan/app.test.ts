import { once } from "node:events";
import type { Server } from "node:http";
import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger } from "utils/logger";
import { buildPlan, type OperationResult, type Plan } from "utils/plan";
import { createViewerApp } from "./app";
import { EMPTY_PREFERENCES_MESSAGE } from "../generate-meal-plan/config";

const silent = createLogger({ silent: true });

const PLAN = buildPlan(
  [
    { id: "1", date: "2024-03-10", mealType: "breakfast", item: "Poha", method: "Steam", prep: "", quantity: "1 bowl" },
    { id: "2", date: "2024-03-12", mealType: "lunch", item: "Chole", method: "Boil", prep: "", quantity: "1 plate" },
  ],
  silent
);

let server: Server | undefined;

afterEach(async () => {
  if (server) {
    server.close();
    await once(server, "close");
    server = undefined;
  }
});

const start = async (load: () => Promise<Plan>, result: OperationResult = { status: "success", message: "Saved 90 meals" }) => {
  const generate = vi.fn(async (_preferences: string) => result);
  const app = createViewerApp({
    repository: { load: vi.fn(load) },
    generate,
    now: () => new Date(2024, 2, 10),
    logger: silent,
  });

  server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("Viewer did not bind a port");
  return { baseUrl: `http://127.0.0.1:${address.port}`, generate };
};

const postPreferences = (baseUrl: string, preferences: string) =>
  fetch(`${baseUrl}/generate`, { method: "POST", body: new URLSearchParams({ preferences }) });

describe("createViewerApp", () => {
  it("shows the selected date", async () => {
    const { baseUrl } = await start(async () => PLAN);

    const response = await fetch(`${baseUrl}/?date=2024-03-12`);
    const html = await response.text();

    expect(response.status).toBe(200);
    expect(html).toContain('<input type="date" name="date" value="2024-03-12">');
    expect(html).toContain("<strong>Lunch:</strong> Chole");
  });

  it("falls back to today for an invalid or repeated date", async () => {
    const { baseUrl } = await start(async () => PLAN);

    const invalid = await (await fetch(`${baseUrl}/?date=12-03-2024`)).text();
    const repeated = await (await fetch(`${baseUrl}/?date=2024-03-12&date=2024-03-13`)).text();

    expect(invalid).toContain('value="2024-03-10"');
    expect(repeated).toContain('value="2024-03-10"');
  });

  it("shows the no plan state when nothing is stored", async () => {
    const { baseUrl } = await start(async () => ({}));

    const html = await (await fetch(baseUrl)).text();

    expect(html).toContain("No meal plan stored yet. Generate a plan above.");
    expect(html).not.toContain("Check another day");
  });

  it("rejects blank preferences without generating", async () => {
    const { baseUrl, generate } = await start(async () => PLAN);

    const response = await postPreferences(baseUrl, "   ");

    expect(response.status).toBe(400);
    expect(await response.text()).toContain(EMPTY_PREFERENCES_MESSAGE);
    expect(generate).not.toHaveBeenCalled();
  });

  it("generates a plan and shows the result", async () => {
    const { baseUrl, generate } = await start(async () => PLAN);

    const response = await postPreferences(baseUrl, "high protein");

    expect(response.status).toBe(200);
    expect(await response.text()).toContain("✅ Saved 90 meals");
    expect(generate).toHaveBeenCalledWith("high protein");
  });

  it("returns a server error when the plan cannot be loaded", async () => {
    const { baseUrl } = await start(async () => {
      throw new Error("store offline");
    });

    const response = await fetch(baseUrl);

    expect(response.status).toBe(500);
    expect(await response.text()).toBe("Could not load the meal plan");
  });
});
