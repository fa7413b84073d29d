import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";

// Clients are created per pipeline run and passed down, never cached here.

export const createOpenAIClient = () =>
  createOpenAI({
    baseURL: process.env.OPENAI_BASE_URL || undefined,
    apiKey: process.env.OPENAI_API_KEY,
  });

export const createGeminiClient = () =>
  createGoogleGenerativeAI({
    apiKey: process.env.GOOGLE_GENERATIVE_AI_API_KEY,
  });

export type OpenAIClient = ReturnType<typeof createOpenAIClient>;
