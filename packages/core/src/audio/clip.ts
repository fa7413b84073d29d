import { AudioClip, AudioFormat } from "../types/audio";

export const clipFrameCount = (clip: AudioClip): number =>
  clip.channels[0]?.length ?? 0;

export const clipDuration = (clip: AudioClip): number =>
  clip.sampleRate > 0 ? clipFrameCount(clip) / clip.sampleRate : 0;

export const createSilentClip = (
  format: AudioFormat,
  frameCount: number
): AudioClip => ({
  sampleRate: format.sampleRate,
  channels: Array.from(
    { length: format.channelCount },
    () => new Float32Array(frameCount)
  ),
});

/** Averages every channel down to one. */
export function mixdownChannels(channels: Float32Array[]): Float32Array {
  if (channels.length < 2) {
    return channels[0]?.slice() ?? new Float32Array(0);
  }

  const length = channels[0].length;
  const output = new Float32Array(length);
  for (const channel of channels) {
    for (let sampleIndex = 0; sampleIndex < length; sampleIndex += 1) {
      output[sampleIndex] += channel[sampleIndex] ?? 0;
    }
  }
  for (let sampleIndex = 0; sampleIndex < length; sampleIndex += 1) {
    output[sampleIndex] /= channels.length;
  }
  return output;
}

function remapChannels(
  channels: Float32Array[],
  channelCount: number
): Float32Array[] {
  if (channels.length === channelCount) {
    return channels;
  }
  if (channels.length === 0) {
    return Array.from({ length: channelCount }, () => new Float32Array(0));
  }
  const mono = mixdownChannels(channels);
  return Array.from({ length: channelCount }, () => mono.slice());
}

/** Linear interpolation resampler. */
export function resampleChannel(
  input: Float32Array,
  fromRate: number,
  toRate: number
): Float32Array {
  if (fromRate === toRate || input.length === 0) {
    return input;
  }

  const outputLength = Math.round((input.length * toRate) / fromRate);
  const output = new Float32Array(outputLength);
  const step = fromRate / toRate;
  const last = input.length - 1;
  for (let index = 0; index < outputLength; index += 1) {
    const position = index * step;
    const left = Math.min(Math.floor(position), last);
    const right = Math.min(left + 1, last);
    const fraction = position - left;
    output[index] = input[left] + (input[right] - input[left]) * fraction;
  }
  return output;
}

/**
 * Returns the clip in the requested format, converting channel layout first
 * and sample rate second. A clip already in that format is returned as is.
 */
export function convertClip(clip: AudioClip, format: AudioFormat): AudioClip {
  const channels = remapChannels(clip.channels, format.channelCount).map(
    (channel) => resampleChannel(channel, clip.sampleRate, format.sampleRate)
  );
  return { sampleRate: format.sampleRate, channels };
}
