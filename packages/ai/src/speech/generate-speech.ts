import { experimental_generateSpeech as generateSpeech } from "ai";
import { createOpenAIClient, type OpenAIClient } from "../lib";
import { DEFAULT_SPEECH_VOICE, SPEECH_MODEL } from "./config";

export interface GenerateSpeechOptions {
  voice?: string;
  language?: string;
  model?: string;
  client?: OpenAIClient;
}

export interface SpeechAudio {
  data: Uint8Array;
  mediaType: string;
  /** File extension of the encoded audio, e.g. "wav". */
  format: string;
}

/**
 * Synthesizes one line of speech as an encoded WAV file.
 */
export const generateSpeechAudio = async (
  text: string,
  options: GenerateSpeechOptions = {}
): Promise<SpeechAudio> => {
  const model = options.model ?? SPEECH_MODEL;
  const client = options.client ?? createOpenAIClient();

  const { audio } = await generateSpeech({
    model: client.speech(model),
    text,
    voice: options.voice ?? DEFAULT_SPEECH_VOICE,
    language: options.language,
    outputFormat: "wav",
    maxRetries: 2,
  });

  return {
    data: audio.uint8Array,
    mediaType: audio.mediaType,
    format: audio.format,
  };
};
