import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Mock } from "vitest";
import type { AudioClip, AudioEncoder, SynthesisBackend } from "../types/audio";
import type { FileStore } from "../types/storage";
import { Segment, createSegment } from "../types/subtitle";
import { parseSrt } from "../utils/srt";
import {
  SynthesisPipelineDeps,
  createSubtitleSynthesisTask,
  createSynthesisTask,
} from "./timeline-synthesizer";

const SAMPLE_RATE = 24000;

// Clip length in seconds and the constant sample value it is filled with.
const CLIPS: Record<string, { duration: number; value: number }> = {
  a: { duration: 0.5, value: 0.25 },
  b: { duration: 0.75, value: 0.5 },
  c: { duration: 0.25, value: -0.5 },
};

const makeClip = (text: string): AudioClip => {
  const stub = CLIPS[text];
  if (!stub) {
    throw new Error(`voice unavailable for "${text}"`);
  }
  return {
    sampleRate: SAMPLE_RATE,
    channels: [new Float32Array(stub.duration * SAMPLE_RATE).fill(stub.value)],
  };
};

const ENCODED = Uint8Array.from([1, 2, 3]);

describe("timeline audio synthesizer", () => {
  let backend: SynthesisBackend;
  let encodeAudio: Mock<AudioEncoder>;
  let written: Map<string, Uint8Array>;
  let deps: SynthesisPipelineDeps;

  beforeEach(() => {
    backend = {
      name: "stub",
      synthesize: vi.fn(async (text: string) => makeClip(text)),
    };
    encodeAudio = vi.fn<AudioEncoder>(async () => ENCODED);
    written = new Map();
    const files: FileStore = {
      readText: vi.fn(async () => ""),
      writeText: vi.fn(async () => {}),
      writeBytes: vi.fn(async (path: string, data: Uint8Array) => {
        written.set(path, data);
      }),
    };
    deps = { backend, encodeAudio, files };
  });

  const synthesize = async (
    segments: Segment[],
    destinationPath = "out/voice.wav"
  ) => {
    const task = createSynthesisTask(deps, {
      segments,
      targetLanguage: "km",
      destinationPath,
    });
    const outcome = await task.run();
    const clip = encodeAudio.mock.calls[0]?.[0];
    return { task, outcome, clip };
  };

  it("fills the gap between segments with silence", async () => {
    const { outcome, clip } = await synthesize([
      createSegment(0, 1, "a"),
      createSegment(3, 4, "b"),
    ]);

    expect(outcome).toEqual({
      ok: true,
      result: {
        kind: "written",
        destinationPath: "out/voice.wav",
        containerFormat: "wav",
        duration: 0.5 + 2 + 0.75,
        declaredEnd: 4,
        drift: -0.75,
        skipped: [],
      },
    });
    const samples = clip?.channels[0];
    expect(samples).toHaveLength(78000);
    expect(samples?.[11999]).toBe(0.25);
    expect(samples?.[12000]).toBe(0);
    expect(samples?.[59999]).toBe(0);
    expect(samples?.[60000]).toBe(0.5);
  });

  it("inserts no silence before a segment that starts before the cursor", async () => {
    const { outcome, clip } = await synthesize([
      createSegment(0, 2, "a"),
      createSegment(1, 1.5, "b"),
    ]);

    expect(outcome.ok && outcome.result.kind === "written" && outcome.result.duration).toBe(
      0.5 + 0.75
    );
    expect(clip?.channels[0]).toHaveLength(30000);
    expect(clip?.channels[0][12000]).toBe(0.5);
  });

  it("skips a failed segment but still moves the cursor to its declared end", async () => {
    const { task, outcome, clip } = await synthesize([
      createSegment(0, 1, "a"),
      createSegment(2, 3, "missing"),
      createSegment(5, 6, "b"),
    ]);

    // a (0.5s) + 1s gap + nothing + 2s gap from the failed end (3) + b (0.75s)
    expect(outcome.ok && outcome.result.kind === "written" && outcome.result.duration).toBe(
      4.25
    );
    expect(outcome.ok && outcome.result.kind === "written" && outcome.result.skipped).toEqual([2]);
    const samples = clip?.channels[0];
    expect(samples).toHaveLength(102000);
    expect(samples?.[83999]).toBe(0);
    expect(samples?.[84000]).toBe(0.5);
    expect(
      task.events.filter((event) => event.level === "warning").map((event) => event.message)
    ).toEqual([
      'Skipping segment 2 due to TTS generation error: voice unavailable for "missing"',
    ]);
  });

  it("calls the backend in order, one segment at a time", async () => {
    let active = 0;
    let maxActive = 0;
    vi.mocked(backend.synthesize).mockImplementation(async (text) => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return makeClip(text);
    });

    await synthesize([
      createSegment(0, 1, "c"),
      createSegment(1, 2, "a"),
      createSegment(2, 3, "b"),
    ]);

    expect(maxActive).toBe(1);
    expect(vi.mocked(backend.synthesize).mock.calls).toEqual([
      ["c", "km"],
      ["a", "km"],
      ["b", "km"],
    ]);
  });

  it("reports empty input without producing output", async () => {
    const onSuccess = vi.fn();
    const task = createSynthesisTask(deps, {
      segments: parseSrt("not a subtitle"),
      targetLanguage: "km",
      destinationPath: "out/voice.mp3",
    });
    task.onSuccess(onSuccess);

    const outcome = await task.run();

    expect(outcome).toEqual({ ok: true, result: { kind: "empty" } });
    expect(onSuccess).toHaveBeenCalledWith({ kind: "empty" });
    expect(task.events.map((event) => [event.level, event.message])).toEqual([
      ["info", "No valid subtitle segments found."],
    ]);
    expect(backend.synthesize).not.toHaveBeenCalled();
    expect(encodeAudio).not.toHaveBeenCalled();
    expect(written.size).toBe(0);
  });

  it("encodes unknown extensions as mp3 and writes to the given path", async () => {
    const { task, outcome } = await synthesize([createSegment(0, 1, "a")], "out/voice.ogg");

    expect(encodeAudio).toHaveBeenCalledWith(expect.anything(), "mp3");
    expect(written.get("out/voice.ogg")).toBe(ENCODED);
    expect(outcome.ok && outcome.result.kind === "written" && outcome.result.containerFormat).toBe(
      "mp3"
    );
    expect(task.events.map((event) => event.message)).toEqual([
      "Generating voice audio based on timeline with stub...",
      "Voice audio saved to out/voice.ogg",
    ]);
  });

  it("fails without writing when encoding fails", async () => {
    encodeAudio.mockRejectedValue(new Error("ffmpeg exited with code 1"));

    const { outcome } = await synthesize([createSegment(0, 1, "a")]);

    expect(outcome).toEqual({
      ok: false,
      error: "Failed to encode wav audio: ffmpeg exited with code 1",
    });
    expect(written.size).toBe(0);
  });

  it("stops between segments when cancelled", async () => {
    const task = createSynthesisTask(deps, {
      segments: [createSegment(0, 1, "a"), createSegment(1, 2, "b")],
      targetLanguage: "km",
      destinationPath: "out/voice.wav",
    });
    vi.mocked(backend.synthesize).mockImplementation(async (text) => {
      task.cancel();
      return makeClip(text);
    });

    const outcome = await task.run();

    expect(outcome).toEqual({ ok: false, error: "Task cancelled" });
    expect(backend.synthesize).toHaveBeenCalledTimes(1);
    expect(encodeAudio).not.toHaveBeenCalled();
  });

  describe("from a subtitle file", () => {
    it("parses the file and synthesizes its valid blocks", async () => {
      vi.mocked(deps.files.readText).mockResolvedValue(
        "1\n00:00:00,000 --> 00:00:01,000\na\n\n" +
          "broken block\n\n" +
          "2\n00:00:01,500 --> 00:00:02,000\nc\n"
      );
      const task = createSubtitleSynthesisTask(deps, {
        subtitlePath: "in/dub.srt",
        targetLanguage: "km",
        destinationPath: "out/voice.wav",
      });

      const outcome = await task.run();

      expect(deps.files.readText).toHaveBeenCalledWith("in/dub.srt");
      expect(vi.mocked(backend.synthesize).mock.calls).toEqual([
        ["a", "km"],
        ["c", "km"],
      ]);
      // 0.5s clip, 0.5s gap, 0.25s clip
      expect(outcome.ok && outcome.result.kind === "written" && outcome.result.duration).toBe(1.25);
    });

    it("fails with a resource error when the file cannot be read", async () => {
      vi.mocked(deps.files.readText).mockRejectedValue(new Error("ENOENT: no such file"));

      const outcome = await createSubtitleSynthesisTask(deps, {
        subtitlePath: "missing.srt",
        targetLanguage: "km",
        destinationPath: "out/voice.wav",
      }).run();

      expect(outcome).toEqual({
        ok: false,
        error: "Failed to read subtitles from missing.srt: ENOENT: no such file",
      });
      expect(backend.synthesize).not.toHaveBeenCalled();
    });
  });
});
