import { Client } from "@notionhq/client";
import type {
  CreatePageParameters,
  UpdatePageParameters,
} from "@notionhq/client/build/src/api-endpoints";
// Utils
import { logger } from "utils/logger";
// Types
import type { MealEntry, MealRow } from "utils/plan";
import type { MealPlanTable } from "utils/repository";

const NOTION_API_URL = "https://api.notion.com/v1";
const NOTION_VERSION = "2022-06-28";
// Notion rejects rich text objects longer than this.
const RICH_TEXT_LIMIT = 2000;

export interface NotionPage {
  id: string;
  properties: Record<string, unknown>;
}

interface DatabaseQueryResponse {
  results: NotionPage[];
  has_more: boolean;
  next_cursor: string | null;
}

export interface NotionPagesApi {
  pages: {
    create: (args: CreatePageParameters) => Promise<{ id: string }>;
    update: (args: UpdatePageParameters) => Promise<{ id: string }>;
  };
}

type TextRequest = Array<{ text: { content: string } }>;

export type NotionPropertyRequest =
  | { title: TextRequest }
  | { rich_text: TextRequest };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isNotionPage = (value: unknown): value is NotionPage =>
  isRecord(value) && typeof value.id === "string" && isRecord(value.properties);

const isDatabaseQueryResponse = (value: unknown): value is DatabaseQueryResponse =>
  isRecord(value) &&
  Array.isArray(value.results) &&
  typeof value.has_more === "boolean" &&
  (typeof value.next_cursor === "string" || value.next_cursor === null);

export const createNotionClient = (token: string): Client =>
  new Client({ auth: token });

export const getAllPages = async (
  databaseId: string,
  token: string,
  fetchImpl: typeof fetch = fetch
): Promise<NotionPage[]> => {
  const allPages: NotionPage[] = [];
  let hasMore = true;
  let startCursor: string | undefined = undefined;

  while (hasMore) {
    const response = await fetchImpl(`${NOTION_API_URL}/databases/${databaseId}/query`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${token}`,
        "Notion-Version": NOTION_VERSION,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        start_cursor: startCursor,
        page_size: 100,
        sorts: [{ timestamp: "created_time", direction: "ascending" }],
      }),
    });

    const data: unknown = await response.json();

    if (!response.ok) {
      const message = isRecord(data) && typeof data.message === "string" ? data.message : response.statusText;
      throw new Error(`Failed to query database: ${message}`);
    }

    if (!isDatabaseQueryResponse(data)) {
      throw new Error("Failed to query database: unexpected response shape");
    }

    // Partial pages carry no properties and are of no use here.
    allPages.push(...data.results.filter(isNotionPage));

    hasMore = data.has_more;
    startCursor = data.next_cursor || undefined;

    logger.debug(`Fetched ${data.results.length} pages (total so far: ${allPages.length})`);
  }

  logger.info(`Found ${allPages.length} pages in database`);
  return allPages;
};

export const readPlainText = (property: unknown): string => {
  if (!isRecord(property)) return "";

  const type = property.type;
  if (type !== "title" && type !== "rich_text") return "";

  const items = property[type];
  if (!Array.isArray(items)) return "";

  return items
    .map((item) => (isRecord(item) && typeof item.plain_text === "string" ? item.plain_text : ""))
    .join("");
};

const chunkText = (value: string): TextRequest => {
  const chunks: TextRequest = [];
  for (let i = 0; i < value.length; i += RICH_TEXT_LIMIT) {
    chunks.push({ text: { content: value.slice(i, i + RICH_TEXT_LIMIT) } });
  }
  return chunks;
};

export const propertyBuilders = {
  title: (value: string): { title: TextRequest } => ({ title: chunkText(value) }),
  richText: (value: string): { rich_text: TextRequest } => ({ rich_text: chunkText(value) }),
};

// Every column is plain text so that whatever the model wrote is stored as-is.
export const MEAL_PLAN_PROPERTIES: Array<[string, keyof MealRow]> = [
  ["Date", "date"],
  ["Meal type", "mealType"],
  ["Item", "item"],
  ["Method", "method"],
  ["Prep", "prep"],
  ["Quantity", "quantity"],
];

export const mealRowToProperties = (row: MealRow): Record<string, NotionPropertyRequest> => {
  const properties: Record<string, NotionPropertyRequest> = {
    Name: propertyBuilders.title(`${row.date} ${row.mealType}`.trim()),
  };
  for (const [propertyName, field] of MEAL_PLAN_PROPERTIES) {
    properties[propertyName] = propertyBuilders.richText(row[field]);
  }
  return properties;
};

export const pageToMealEntry = (page: NotionPage): MealEntry => {
  const entry: MealEntry = {
    id: page.id,
    date: "",
    mealType: "",
    item: "",
    method: "",
    prep: "",
    quantity: "",
  };
  for (const [propertyName, field] of MEAL_PLAN_PROPERTIES) {
    entry[field] = readPlainText(page.properties[propertyName]);
  }
  return entry;
};

export interface NotionMealPlanTableOptions {
  notion: NotionPagesApi;
  databaseId: string;
  token: string;
  fetchImpl?: typeof fetch;
}

export const createNotionMealPlanTable = ({
  notion,
  databaseId,
  token,
  fetchImpl = fetch,
}: NotionMealPlanTableOptions): MealPlanTable => ({
  selectAll: async () => {
    const pages = await getAllPages(databaseId, token, fetchImpl);
    return pages.map(pageToMealEntry);
  },

  insert: async (row) => {
    const page = await notion.pages.create({
      parent: { database_id: databaseId },
      properties: mealRowToProperties(row),
    });
    return { ...row, id: page.id };
  },

  remove: async (id) => {
    await notion.pages.update({ page_id: id, archived: true });
  },
});
