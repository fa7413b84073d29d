import { describe, it, expect } from "vitest";
import { Timeline } from "./timeline";

const MONO_1K = { sampleRate: 1000, channelCount: 1 };

describe("Timeline", () => {
  it("starts empty with the cursor at zero", () => {
    const timeline = new Timeline(MONO_1K);
    expect(timeline.cursor).toBe(0);
    expect(timeline.duration).toBe(0);
    expect(timeline.toClip().channels[0]).toHaveLength(0);
  });

  it("rejects an unusable format", () => {
    expect(() => new Timeline({ sampleRate: 0, channelCount: 1 })).toThrow(RangeError);
    expect(() => new Timeline({ sampleRate: 1000, channelCount: 0 })).toThrow(RangeError);
  });

  it("appends silence truncated to whole milliseconds", () => {
    const timeline = new Timeline(MONO_1K);
    timeline.appendSilence(0.5);
    timeline.appendSilence(0.0015);
    timeline.appendSilence(0.0004);
    timeline.appendSilence(-1);
    expect(timeline.frameCount).toBe(501);
  });

  it("concatenates silence and clips in append order", () => {
    const timeline = new Timeline(MONO_1K);
    timeline.appendSilence(0.002);
    timeline.appendClip({ sampleRate: 1000, channels: [Float32Array.from([0.25, -0.25])] });

    const clip = timeline.toClip();
    expect(clip.sampleRate).toBe(1000);
    expect(Array.from(clip.channels[0])).toEqual([0, 0, 0.25, -0.25]);
    expect(timeline.duration).toBe(0.004);
  });

  it("converts clips to the timeline format", () => {
    const timeline = new Timeline(MONO_1K);
    timeline.appendClip({
      sampleRate: 2000,
      channels: [Float32Array.from([0.1, 0.2, 0.3, 0.4])],
    });
    timeline.appendClip({
      sampleRate: 1000,
      channels: [Float32Array.from([1, 0.5]), Float32Array.from([0, 0.5])],
    });

    expect(timeline.toClip().channels[0]).toEqual(
      Float32Array.from([0.1, 0.3, 0.5, 0.5])
    );
  });

  it("ignores empty clips", () => {
    const timeline = new Timeline(MONO_1K);
    timeline.appendClip({ sampleRate: 1000, channels: [new Float32Array(0)] });
    expect(timeline.frameCount).toBe(0);
  });
});
