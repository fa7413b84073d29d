import { createSubtitleSynthesisTask, type SynthesisTask } from "@dubline/core";
import type { CliConfig } from "../config";
import { encodeAudio } from "../lib/ffmpeg";
import { createSynthesisBackend, type VoiceSelection } from "../lib/voices";
import { nodeFileStore } from "../utils/file";

export interface GenerateVoiceOptions {
  subtitlePath: string;
  destinationPath: string;
  targetLanguage: string;
  voice: VoiceSelection;
}

export const createGenerateVoiceTask = (
  { subtitlePath, destinationPath, targetLanguage, voice }: GenerateVoiceOptions,
  config: CliConfig
): SynthesisTask =>
  createSubtitleSynthesisTask(
    {
      backend: createSynthesisBackend(voice, {
        format: config.timelineFormat,
        espeakBin: config.espeakBin,
      }),
      encodeAudio,
      files: nodeFileStore,
    },
    {
      subtitlePath,
      destinationPath,
      targetLanguage,
      format: config.timelineFormat,
    }
  );
