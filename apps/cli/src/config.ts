import type { AudioFormat } from "@dubline/core";
import { z } from "zod";

const envSchema = z.object({
  TIMELINE_SAMPLE_RATE: z.coerce.number().int().positive().default(24000),
  TIMELINE_CHANNELS: z.coerce.number().int().min(1).max(2).default(1),
  ESPEAK_BIN: z.string().min(1).default("espeak-ng"),
});

export interface CliConfig {
  timelineFormat: AudioFormat;
  espeakBin: string;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): CliConfig => {
  const parsed = envSchema.parse(env);
  return {
    timelineFormat: {
      sampleRate: parsed.TIMELINE_SAMPLE_RATE,
      channelCount: parsed.TIMELINE_CHANNELS,
    },
    espeakBin: parsed.ESPEAK_BIN,
  };
};
