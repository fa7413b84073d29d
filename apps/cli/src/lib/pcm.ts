import type { AudioClip } from "@dubline/core";

const BYTES_PER_SAMPLE = 4;

/** Planar clip → interleaved 32-bit float little-endian bytes. */
export const interleaveFloat32 = (clip: AudioClip): Uint8Array => {
  const channelCount = clip.channels.length;
  const frameCount = clip.channels[0]?.length ?? 0;
  const bytes = new Uint8Array(frameCount * channelCount * BYTES_PER_SAMPLE);
  const view = new DataView(bytes.buffer);

  for (let frame = 0; frame < frameCount; frame += 1) {
    for (let channel = 0; channel < channelCount; channel += 1) {
      const offset = (frame * channelCount + channel) * BYTES_PER_SAMPLE;
      view.setFloat32(offset, clip.channels[channel][frame], true);
    }
  }
  return bytes;
};

/** Interleaved 32-bit float little-endian bytes → planar clip. */
export const deinterleaveFloat32 = (
  bytes: Uint8Array,
  sampleRate: number,
  channelCount: number
): AudioClip => {
  const frameCount = Math.floor(bytes.byteLength / (BYTES_PER_SAMPLE * channelCount));
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const channels = Array.from({ length: channelCount }, () => new Float32Array(frameCount));

  for (let frame = 0; frame < frameCount; frame += 1) {
    for (let channel = 0; channel < channelCount; channel += 1) {
      const offset = (frame * channelCount + channel) * BYTES_PER_SAMPLE;
      channels[channel][frame] = view.getFloat32(offset, true);
    }
  }
  return { sampleRate, channels };
};
