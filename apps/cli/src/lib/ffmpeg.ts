import type {
  AudioClip,
  AudioContainerFormat,
  AudioEncoder,
  AudioExtractor,
  AudioFormat,
} from "@dubline/core";
import ffmpeg from "fluent-ffmpeg";
import fs from "fs/promises";
import path from "path";
import { createTempDir, removeDir, withTempDir } from "../utils/file";
import { deinterleaveFloat32, interleaveFloat32 } from "./pcm";

// fluent-ffmpeg finds the binaries through FFMPEG_PATH / FFPROBE_PATH or PATH.

const EXTRACTION_SAMPLE_RATE = 16000;

const CODECS: Record<AudioContainerFormat, string> = {
  mp3: "libmp3lame",
  wav: "pcm_s16le",
};

const save = (command: ffmpeg.FfmpegCommand, output: string) =>
  new Promise<void>((resolve, reject) => {
    command
      .on("end", () => resolve())
      .on("error", (error: Error) => reject(error))
      .save(output);
  });

export const probeDuration = (file: string) =>
  new Promise<number>((resolve, reject) => {
    ffmpeg.ffprobe(file, (error, data) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(data.format.duration ?? 0);
    });
  });

/**
 * Pulls a mono 16 kHz WAV track out of a media file into its own temporary
 * directory. The returned handle removes it on dispose.
 */
export const extractAudio: AudioExtractor = async (mediaPath) => {
  const dir = await createTempDir("dubline-extract-");
  const dispose = () => removeDir(dir);

  try {
    const output = path.join(dir, "audio.wav");
    await save(
      ffmpeg(mediaPath)
        .noVideo()
        .audioChannels(1)
        .audioFrequency(EXTRACTION_SAMPLE_RATE)
        .audioCodec("pcm_s16le")
        .format("wav"),
      output
    );
    const durationInSeconds = await probeDuration(output);
    return { path: output, durationInSeconds, dispose };
  } catch (error) {
    await dispose();
    throw error;
  }
};

/** Decodes any audio file ffmpeg understands into a clip of the given format. */
export const decodeAudioFile = (file: string, format: AudioFormat): Promise<AudioClip> =>
  withTempDir("dubline-decode-", async (dir) => {
    const output = path.join(dir, "audio.f32");
    await save(
      ffmpeg(file)
        .noVideo()
        .audioChannels(format.channelCount)
        .audioFrequency(format.sampleRate)
        .audioCodec("pcm_f32le")
        .format("f32le"),
      output
    );
    const bytes = await fs.readFile(output);
    return deinterleaveFloat32(bytes, format.sampleRate, format.channelCount);
  });

export const encodeAudio: AudioEncoder = (clip, format) =>
  withTempDir("dubline-encode-", async (dir) => {
    const input = path.join(dir, "timeline.f32");
    const output = path.join(dir, `timeline.${format}`);
    await fs.writeFile(input, interleaveFloat32(clip));
    await save(
      ffmpeg(input)
        .inputFormat("f32le")
        .inputOptions([
          "-ar",
          String(clip.sampleRate),
          "-ac",
          String(clip.channels.length),
        ])
        .audioCodec(CODECS[format])
        .format(format),
      output
    );
    return new Uint8Array(await fs.readFile(output));
  });
