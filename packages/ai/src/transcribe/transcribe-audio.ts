import type { TranscriptionOutput } from "@dubline/core";
import { experimental_transcribe as transcribe } from "ai";
import { createOpenAIClient, type OpenAIClient } from "../lib";
import { TRANSCRIPTION_MODEL } from "./config";

export interface TranscribeAudioOptions {
  model?: string;
  client?: OpenAIClient;
  /** ISO-639-1 code of the spoken language; detected when omitted. */
  language?: string;
}

export const transcribeAudio = async (
  audio: Uint8Array,
  options: TranscribeAudioOptions = {}
): Promise<TranscriptionOutput> => {
  const model = options.model ?? TRANSCRIPTION_MODEL;
  const client = options.client ?? createOpenAIClient();

  console.log("[Transcribe Request]", {
    model,
    bytes: audio.byteLength,
    timestamp: new Date().toISOString(),
  });

  const result = await transcribe({
    model: client.transcription(model),
    audio,
    providerOptions: {
      openai: {
        timestampGranularities: ["segment"],
        ...(options.language ? { language: options.language } : {}),
      },
    },
    maxRetries: 2,
  });

  console.log("[Transcribe Response]", {
    language: result.language,
    segmentCount: result.segments.length,
    durationInSeconds: result.durationInSeconds,
    timestamp: new Date().toISOString(),
  });

  return {
    text: result.text,
    language: result.language,
    segments: result.segments.map((segment) => ({
      start: segment.startSecond,
      end: segment.endSecond,
      text: segment.text.trim(),
    })),
  };
};
