import { createGeminiClient } from "../lib";

export const TRANSLATION_MODEL =
  process.env.OPENAI_TRANSLATION_MODEL ?? "gemini-2.5-flash";

export const createTranslationClient = () => createGeminiClient();
