import { SynthesisBackend, SynthesisOutcome } from "../types/audio";
import { TranslationOutcome, Translator } from "../types/translation";
import { describeError } from "../utils/errors";

/**
 * Translates one text, keeping the source text when the translator throws or
 * returns nothing. Only a thrown error carries a warning.
 */
export const translateWithFallback = async (
  translator: Translator,
  text: string,
  targetLanguage: string
): Promise<TranslationOutcome> => {
  try {
    const translated = (await translator.translate(text, targetLanguage)).trim();
    return translated
      ? { kind: "translated", text: translated }
      : { kind: "fallback", text };
  } catch (error) {
    return { kind: "fallback", text, warning: describeError(error) };
  }
};

export const synthesizeOrSkip = async (
  backend: SynthesisBackend,
  text: string,
  targetLanguage: string
): Promise<SynthesisOutcome> => {
  try {
    const clip = await backend.synthesize(text, targetLanguage);
    return { kind: "synthesized", clip };
  } catch (error) {
    return { kind: "failed", warning: describeError(error) };
  }
};
