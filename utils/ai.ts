import { logger } from "utils/logger";

export const DEFAULT_MODEL = "gemini-2.5-flash";

interface AIContentPart {
  text?: string;
}

interface AICandidate {
  content?: {
    parts?: AIContentPart[];
  };
}

export interface AIResponse {
  text?: string;
  candidates?: AICandidate[];
}

export interface GenerateContentRequest {
  model: string;
  contents: string;
  config?: {
    responseMimeType?: string;
  };
}

interface AIModel {
  generateContent: (request: GenerateContentRequest) => Promise<AIResponse>;
}

export interface AIClient {
  models: AIModel;
}

export interface GenerateTextOptions {
  model?: string;
  responseMimeType?: string;
}

export const createAIClient = async (apiKey: string): Promise<AIClient> => {
  const { GoogleGenAI: Client } = await import("@google/genai");
  return new Client({ apiKey });
};

// Prefers the flat `text` field; some responses only carry content parts.
export const extractResponseText = (response: AIResponse): string => {
  if (response.text?.trim()) {
    return response.text;
  }

  const parts = response.candidates?.[0]?.content?.parts ?? [];
  return parts.map((part) => part.text ?? "").join("");
};

export const stripCodeFences = (text: string): string => {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```")) {
    return trimmed;
  }

  return trimmed
    .replace(/^```[\w-]*[^\S\n]*\n?/, "")
    .replace(/\n?\s*```$/, "")
    .trim();
};

export const generateText = async (
  ai: AIClient,
  prompt: string,
  options: GenerateTextOptions = {}
): Promise<string> => {
  const response = await ai.models.generateContent({
    model: options.model ?? DEFAULT_MODEL,
    contents: prompt,
    config: {
      responseMimeType: options.responseMimeType ?? "text/plain",
    },
  });

  const rawText = extractResponseText(response);

  if (process.env.DEBUG) {
    logger.info("AI response", { text: rawText });
  }

  return stripCodeFences(rawText);
};
