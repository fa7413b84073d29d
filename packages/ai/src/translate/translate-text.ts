import type { Translator } from "@dubline/core";
import { generateObject } from "ai";
import type { LanguageModel } from "ai";
import { z } from "zod";
import { createTranslationClient, TRANSLATION_MODEL } from "./config";

export interface TranslatorOptions {
  model?: string;
  /** Resolves a model id to a language model; defaults to a fresh Gemini client. */
  provider?: (modelId: string) => LanguageModel;
}

const translationSchema = z.object({
  translation: z.string().describe("The translated subtitle text"),
});

const buildSystemPrompt = (targetLanguage: string) =>
  `You are a professional subtitle translator. Detect the source language automatically and translate the subtitle line into the language with code "${targetLanguage}".

Guidelines:
- Preserve numbers, proper nouns and line breaks.
- Keep the translation concise and natural for spoken dialogue.
- Output only the translation text, without quotes, notes or speaker names unless they exist in the original.`;

/**
 * Creates a translator that owns its own client. Build one per pipeline run.
 */
export const createTranslator = (options: TranslatorOptions = {}): Translator => {
  const model = options.model ?? TRANSLATION_MODEL;
  const provider = options.provider ?? createTranslationClient();

  return {
    async translate(text, targetLanguage) {
      if (!text.trim()) {
        return text;
      }

      console.log("[Translate Request]", {
        model,
        targetLanguage,
        characters: text.length,
        timestamp: new Date().toISOString(),
      });

      try {
        const { object } = await generateObject({
          model: provider(model),
          schema: translationSchema,
          messages: [
            { role: "system", content: buildSystemPrompt(targetLanguage) },
            { role: "user", content: text },
          ],
          temperature: 0.2,
          maxRetries: 2,
        });

        return object.translation.trim();
      } catch (error) {
        console.error("[Translate Error]", {
          error: error instanceof Error ? error.message : "Unknown translation error",
          model,
          timestamp: new Date().toISOString(),
        });
        throw error;
      }
    },
  };
};
