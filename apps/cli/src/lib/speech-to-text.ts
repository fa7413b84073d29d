import {
  TRANSCRIPTION_MODEL,
  createOpenAIClient,
  transcribeAudio,
  type TranscribeAudioOptions,
} from "@dubline/ai";
import type { SpeechToText } from "@dubline/core";
import fs from "fs/promises";

/** Speech-to-text over the AI SDK, reading the extracted audio from disk. */
export const createSpeechToText = (
  options: TranscribeAudioOptions = {}
): SpeechToText => {
  const model = options.model ?? TRANSCRIPTION_MODEL;
  const client = options.client ?? createOpenAIClient();

  return {
    name: model,
    async transcribe(audio) {
      const bytes = await fs.readFile(audio.path);
      return transcribeAudio(bytes, { ...options, model, client });
    },
  };
};
