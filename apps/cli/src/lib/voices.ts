import {
  DEFAULT_SPEECH_VOICE,
  createOpenAIClient,
  generateSpeechAudio,
} from "@dubline/ai";
import type { AudioFormat, SynthesisBackend } from "@dubline/core";
import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { withTempDir } from "../utils/file";
import { decodeAudioFile } from "./ffmpeg";
import { synthesizeWithEspeak } from "./espeak";

export const VOICE_BACKENDS = ["openai", "espeak"] as const;

export type VoiceSelection =
  | { backend: "openai"; voice: string }
  | { backend: "espeak"; voice?: string };

const backendSchema = z.enum(VOICE_BACKENDS);

/**
 * Parses `backend[:voice]`, e.g. `openai:nova`, `espeak` or `espeak:en-us`.
 */
export const parseVoiceSelection = (value: string): VoiceSelection => {
  const separator = value.indexOf(":");
  const name = separator === -1 ? value : value.slice(0, separator);
  const voice = separator === -1 ? "" : value.slice(separator + 1).trim();

  const parsed = backendSchema.safeParse(name.trim().toLowerCase());
  if (!parsed.success) {
    throw new Error(
      `Unknown voice backend "${name}". Expected one of: ${VOICE_BACKENDS.join(", ")}`
    );
  }

  switch (parsed.data) {
    case "openai":
      return { backend: "openai", voice: voice || DEFAULT_SPEECH_VOICE };
    case "espeak":
      return voice ? { backend: "espeak", voice } : { backend: "espeak" };
  }
};

export interface SynthesisBackendOptions {
  format: AudioFormat;
  espeakBin: string;
}

const createOpenAIBackend = (
  voice: string,
  { format }: SynthesisBackendOptions
): SynthesisBackend => {
  const client = createOpenAIClient();
  return {
    name: `openai:${voice}`,
    synthesize: (text, targetLanguage) =>
      withTempDir("dubline-tts-", async (dir) => {
        const speech = await generateSpeechAudio(text, {
          voice,
          language: targetLanguage,
          client,
        });
        const file = path.join(dir, `speech.${speech.format}`);
        await fs.writeFile(file, speech.data);
        return decodeAudioFile(file, format);
      }),
  };
};

const createEspeakBackend = (
  voice: string | undefined,
  { format, espeakBin }: SynthesisBackendOptions
): SynthesisBackend => ({
  name: `espeak:${voice ?? "target language"}`,
  synthesize: (text, targetLanguage) =>
    withTempDir("dubline-tts-", async (dir) => {
      const file = path.join(dir, "speech.wav");
      await synthesizeWithEspeak(text, file, {
        bin: espeakBin,
        voice: voice ?? targetLanguage,
      });
      return decodeAudioFile(file, format);
    }),
});

/** Builds the backend once for a whole synthesis run. */
export const createSynthesisBackend = (
  selection: VoiceSelection,
  options: SynthesisBackendOptions
): SynthesisBackend => {
  switch (selection.backend) {
    case "openai":
      return createOpenAIBackend(selection.voice, options);
    case "espeak":
      return createEspeakBackend(selection.voice, options);
  }
};
