import { AudioClip, AudioFormat } from "../types/audio";
import { clipFrameCount, convertClip, createSilentClip } from "./clip";

/**
 * Append-only audio buffer with a cursor holding the declared end time (in
 * seconds) of the last segment processed.
 */
export class Timeline {
  readonly format: AudioFormat;

  cursor = 0;

  private chunks: Float32Array[][] = [];

  private frames = 0;

  constructor(format: AudioFormat) {
    if (format.sampleRate <= 0 || format.channelCount <= 0) {
      throw new RangeError(
        `Invalid timeline format: ${format.sampleRate} Hz, ${format.channelCount} channel(s)`
      );
    }
    this.format = { ...format };
  }

  get frameCount(): number {
    return this.frames;
  }

  get duration(): number {
    return this.frames / this.format.sampleRate;
  }

  /**
   * Appends silence, truncated to whole milliseconds.
   */
  appendSilence(seconds: number): void {
    const milliseconds = Math.trunc(seconds * 1000);
    if (milliseconds <= 0) {
      return;
    }
    const frameCount = Math.round((milliseconds * this.format.sampleRate) / 1000);
    this.push(createSilentClip(this.format, frameCount));
  }

  appendClip(clip: AudioClip): void {
    this.push(convertClip(clip, this.format));
  }

  toClip(): AudioClip {
    const channels = Array.from({ length: this.format.channelCount }, (_, channelIndex) => {
      const output = new Float32Array(this.frames);
      let offset = 0;
      for (const chunk of this.chunks) {
        output.set(chunk[channelIndex], offset);
        offset += chunk[channelIndex].length;
      }
      return output;
    });
    return { sampleRate: this.format.sampleRate, channels };
  }

  private push(clip: AudioClip): void {
    const frameCount = clipFrameCount(clip);
    if (frameCount === 0) {
      return;
    }
    this.chunks.push(clip.channels);
    this.frames += frameCount;
  }
}
