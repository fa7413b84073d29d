import { resolveContainerFormat } from "../audio/format";
import { Timeline } from "../audio/timeline";
import {
  AudioClip,
  AudioContainerFormat,
  AudioEncoder,
  AudioFormat,
  SynthesisBackend,
} from "../types/audio";
import { FileStore } from "../types/storage";
import { Segment } from "../types/subtitle";
import { PipelineTask, TaskContext } from "../task/pipeline-task";
import {
  ExternalServiceError,
  ResourceError,
  describeError,
} from "../utils/errors";
import { parseSrt } from "../utils/srt";
import { synthesizeOrSkip } from "./outcomes";

export type SynthesisStage =
  | "idle"
  | "synthesizing"
  | "encoding"
  | "done"
  | "failed";

export const DEFAULT_TIMELINE_FORMAT: AudioFormat = {
  sampleRate: 24000,
  channelCount: 1,
};

export interface AssembledTimeline {
  clip: AudioClip;
  /** Seconds of audio actually assembled. */
  duration: number;
  /** Declared end of the last segment, i.e. the final cursor. */
  declaredEnd: number;
  /** 1-based positions of segments that contributed no audio. */
  skipped: number[];
}

/**
 * Lays the segments out on one timeline, in order. Silence fills the gap
 * between the cursor and each segment's start; a segment starting at or
 * before the cursor is appended right after the previous clip with no
 * correction. The cursor always moves to the segment's declared end, so clip
 * durations that differ from their slot accumulate as drift.
 */
export const assembleTimeline = async (
  segments: readonly Segment[],
  backend: SynthesisBackend,
  targetLanguage: string,
  format: AudioFormat,
  context: TaskContext<SynthesisStage>
): Promise<AssembledTimeline> => {
  const timeline = new Timeline(format);
  const skipped: number[] = [];

  for (const [position, segment] of segments.entries()) {
    context.throwIfCancelled();

    const gap = segment.start - timeline.cursor;
    if (gap > 0) {
      timeline.appendSilence(gap);
    }

    const outcome = await synthesizeOrSkip(backend, segment.text, targetLanguage);
    if (outcome.kind === "synthesized") {
      timeline.appendClip(outcome.clip);
    } else {
      skipped.push(position + 1);
      context.warn(
        `Skipping segment ${position + 1} due to TTS generation error: ${outcome.warning}`
      );
    }

    timeline.cursor = segment.end;
  }

  return {
    clip: timeline.toClip(),
    duration: timeline.duration,
    declaredEnd: timeline.cursor,
    skipped,
  };
};

export interface SynthesisPipelineDeps {
  /** Chosen once per run. */
  backend: SynthesisBackend;
  encodeAudio: AudioEncoder;
  files: FileStore;
}

export interface SynthesisRequest {
  segments: readonly Segment[];
  targetLanguage: string;
  destinationPath: string;
  format?: AudioFormat;
}

export type SynthesisResult =
  | { kind: "empty" }
  | {
      kind: "written";
      destinationPath: string;
      containerFormat: AudioContainerFormat;
      duration: number;
      declaredEnd: number;
      /** Assembled duration minus declared end; positive means audio runs long. */
      drift: number;
      skipped: number[];
    };

export type SynthesisTask = PipelineTask<SynthesisResult, SynthesisStage>;

export const runSynthesisPipeline = async (
  deps: SynthesisPipelineDeps,
  request: SynthesisRequest,
  context: TaskContext<SynthesisStage>
): Promise<SynthesisResult> => {
  if (request.segments.length === 0) {
    context.progress("No valid subtitle segments found.");
    return { kind: "empty" };
  }

  context.enter(
    "synthesizing",
    `Generating voice audio based on timeline with ${deps.backend.name}...`
  );
  const assembled = await assembleTimeline(
    request.segments,
    deps.backend,
    request.targetLanguage,
    request.format ?? DEFAULT_TIMELINE_FORMAT,
    context
  );

  context.enter("encoding");
  const containerFormat = resolveContainerFormat(request.destinationPath);
  let bytes: Uint8Array;
  try {
    bytes = await deps.encodeAudio(assembled.clip, containerFormat);
  } catch (error) {
    throw new ExternalServiceError(
      `Failed to encode ${containerFormat} audio: ${describeError(error)}`,
      { cause: error }
    );
  }

  try {
    await deps.files.writeBytes(request.destinationPath, bytes);
  } catch (error) {
    throw new ResourceError(
      `Failed to write voice audio to ${request.destinationPath}: ${describeError(error)}`,
      request.destinationPath,
      { cause: error }
    );
  }
  context.progress(`Voice audio saved to ${request.destinationPath}`);

  return {
    kind: "written",
    destinationPath: request.destinationPath,
    containerFormat,
    duration: assembled.duration,
    declaredEnd: assembled.declaredEnd,
    drift: assembled.duration - assembled.declaredEnd,
    skipped: assembled.skipped,
  };
};

/**
 * Subtitle segments → per-segment speech synthesis → one audio file, as one task.
 */
export const createSynthesisTask = (
  deps: SynthesisPipelineDeps,
  request: SynthesisRequest
): SynthesisTask =>
  new PipelineTask<SynthesisResult, SynthesisStage>(
    {
      name: "synthesis",
      initialStage: "idle",
      doneStage: "done",
      failedStage: "failed",
    },
    (context) => runSynthesisPipeline(deps, request, context)
  );

export interface SubtitleSynthesisRequest extends Omit<SynthesisRequest, "segments"> {
  subtitlePath: string;
}

/**
 * Same as {@link createSynthesisTask}, reading the segments from a subtitle
 * file first. Malformed blocks in the file are skipped.
 */
export const createSubtitleSynthesisTask = (
  deps: SynthesisPipelineDeps,
  { subtitlePath, ...request }: SubtitleSynthesisRequest
): SynthesisTask =>
  new PipelineTask<SynthesisResult, SynthesisStage>(
    {
      name: "synthesis",
      initialStage: "idle",
      doneStage: "done",
      failedStage: "failed",
    },
    async (context) => {
      let content: string;
      try {
        content = await deps.files.readText(subtitlePath);
      } catch (error) {
        throw new ResourceError(
          `Failed to read subtitles from ${subtitlePath}: ${describeError(error)}`,
          subtitlePath,
          { cause: error }
        );
      }
      return runSynthesisPipeline(
        deps,
        { ...request, segments: parseSrt(content) },
        context
      );
    }
  );
