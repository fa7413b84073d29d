import { describe, it, expect, vi, beforeEach } from "vitest";

const { transcribeMock, transcriptionModelMock } = vi.hoisted(() => ({
  transcribeMock: vi.fn(),
  transcriptionModelMock: vi.fn((modelId: string) => `transcription:${modelId}`),
}));

vi.mock("ai", () => ({
  experimental_transcribe: transcribeMock,
}));

vi.mock("../lib", () => ({
  createOpenAIClient: vi.fn(() => ({ transcription: transcriptionModelMock })),
}));

import { transcribeAudio } from "./transcribe-audio";

describe("transcribeAudio", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("maps timed segments and trims their text", async () => {
    transcribeMock.mockResolvedValue({
      text: " Hello there. General Kenobi.",
      language: "en",
      durationInSeconds: 4,
      segments: [
        { text: " Hello there.", startSecond: 0, endSecond: 1.2 },
        { text: " General Kenobi.", startSecond: 1.5, endSecond: 3.8 },
      ],
    });
    const audio = Uint8Array.from([0, 1, 2]);

    const output = await transcribeAudio(audio, { model: "whisper-test" });

    expect(output).toEqual({
      text: " Hello there. General Kenobi.",
      language: "en",
      segments: [
        { start: 0, end: 1.2, text: "Hello there." },
        { start: 1.5, end: 3.8, text: "General Kenobi." },
      ],
    });
    expect(transcriptionModelMock).toHaveBeenCalledWith("whisper-test");
    expect(transcribeMock).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "transcription:whisper-test",
        audio,
        providerOptions: { openai: { timestampGranularities: ["segment"] } },
      })
    );
  });

  it("passes the spoken language through when known", async () => {
    transcribeMock.mockResolvedValue({ text: "", segments: [] });

    const output = await transcribeAudio(new Uint8Array(0), { language: "fr" });

    expect(output.segments).toEqual([]);
    expect(transcribeMock.mock.calls[0][0].providerOptions).toEqual({
      openai: { timestampGranularities: ["segment"], language: "fr" },
    });
  });

  it("propagates service errors", async () => {
    transcribeMock.mockRejectedValue(new Error("invalid api key"));

    await expect(transcribeAudio(new Uint8Array(0))).rejects.toThrow("invalid api key");
  });
});
