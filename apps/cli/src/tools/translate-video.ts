import { createTranslator } from "@dubline/ai";
import { createTranscriptionTask, type TranscriptionTask } from "@dubline/core";
import { extractAudio } from "../lib/ffmpeg";
import { createSpeechToText } from "../lib/speech-to-text";
import { nodeFileStore } from "../utils/file";

export interface TranslateVideoOptions {
  mediaPath: string;
  destinationPath: string;
  targetLanguage: string;
  /** Spoken language hint for speech-to-text. */
  sourceLanguage?: string;
  translationModel?: string;
}

/**
 * Builds a fresh transcription task with its own speech-to-text and
 * translation clients.
 */
export const createTranslateVideoTask = ({
  mediaPath,
  destinationPath,
  targetLanguage,
  sourceLanguage,
  translationModel,
}: TranslateVideoOptions): TranscriptionTask =>
  createTranscriptionTask(
    {
      extractAudio,
      speechToText: createSpeechToText({ language: sourceLanguage }),
      translator: createTranslator({ model: translationModel }),
      files: nodeFileStore,
    },
    { mediaPath, destinationPath, targetLanguage }
  );
