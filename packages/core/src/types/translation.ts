export interface Translator {
  translate(text: string, targetLanguage: string): Promise<string>;
}

export type TranslationOutcome =
  | { kind: "translated"; text: string }
  | { kind: "fallback"; text: string; warning?: string };
