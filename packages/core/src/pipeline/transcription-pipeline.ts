import { Segment, TimedText, createSegment } from "../types/subtitle";
import { FileStore } from "../types/storage";
import {
  AudioExtractor,
  ExtractedAudio,
  SpeechToText,
  TranscriptionOutput,
} from "../types/transcription";
import { Translator } from "../types/translation";
import { PipelineTask, TaskContext } from "../task/pipeline-task";
import { ExternalServiceError, ResourceError, describeError } from "../utils/errors";
import { serializeSrt } from "../utils/srt";
import { translateWithFallback } from "./outcomes";

export type TranscriptionStage =
  | "idle"
  | "extracting"
  | "transcribing"
  | "translating"
  | "serializing"
  | "done"
  | "failed";

export interface TranscriptionPipelineDeps {
  extractAudio: AudioExtractor;
  speechToText: SpeechToText;
  /** Owned by this pipeline run; never shared between runs. */
  translator: Translator;
  files: FileStore;
}

export interface TranscriptionRequest {
  mediaPath: string;
  destinationPath: string;
  targetLanguage: string;
}

export interface TranscriptionResult {
  subtitleText: string;
  destinationPath: string;
  segments: Segment[];
  /** Segments that kept their source text because translation failed. */
  fallbackCount: number;
}

export type TranscriptionTask = PipelineTask<TranscriptionResult, TranscriptionStage>;

type Context = TaskContext<TranscriptionStage>;

const toSegments = (
  output: TranscriptionOutput,
  durationInSeconds: number
): TimedText[] => {
  if (output.segments.length > 0) {
    return output.segments;
  }
  return [{ start: 0, end: durationInSeconds, text: output.text }];
};

const extract = async (
  deps: TranscriptionPipelineDeps,
  mediaPath: string,
  context: Context
): Promise<ExtractedAudio> => {
  context.enter("extracting", "Extracting audio from video...");
  try {
    return await deps.extractAudio(mediaPath);
  } catch (error) {
    throw new ExternalServiceError(
      `Audio extraction failed for ${mediaPath}: ${describeError(error)}`,
      { cause: error }
    );
  }
};

const transcribe = async (
  deps: TranscriptionPipelineDeps,
  audio: ExtractedAudio,
  context: Context
): Promise<TimedText[]> => {
  const { speechToText } = deps;
  context.enter(
    "transcribing",
    `Audio extracted. Loading ${speechToText.name} speech-to-text model...`
  );

  try {
    await speechToText.prepare?.();
    context.progress(`Speech-to-text model ${speechToText.name} ready. Transcribing audio...`);
    const output = await speechToText.transcribe(audio);
    const segments = toSegments(output, audio.durationInSeconds);
    context.progress(`Transcribed ${segments.length} segments.`);
    return segments;
  } catch (error) {
    throw new ExternalServiceError(
      `Speech-to-text failed: ${describeError(error)}`,
      { cause: error }
    );
  }
};

const translate = async (
  translator: Translator,
  segments: TimedText[],
  targetLanguage: string,
  context: Context
): Promise<{ segments: Segment[]; fallbackCount: number }> => {
  context.enter("translating", "Translating segments...");

  const translated: Segment[] = [];
  let fallbackCount = 0;

  for (const [position, segment] of segments.entries()) {
    context.throwIfCancelled();
    const outcome = await translateWithFallback(
      translator,
      segment.text,
      targetLanguage
    );
    if (outcome.kind === "fallback" && outcome.warning !== undefined) {
      fallbackCount += 1;
      context.warn(
        `Warning: translation error for segment ${position + 1}: ${outcome.warning}`
      );
    }
    translated.push(createSegment(segment.start, segment.end, outcome.text));
  }

  return { segments: translated, fallbackCount };
};

export const runTranscriptionPipeline = async (
  deps: TranscriptionPipelineDeps,
  request: TranscriptionRequest,
  context: Context
): Promise<TranscriptionResult> => {
  const audio = await extract(deps, request.mediaPath, context);

  let timed: TimedText[];
  try {
    timed = await transcribe(deps, audio, context);
  } finally {
    await audio.dispose().catch((error: unknown) => {
      context.warn(
        `Warning: could not remove extracted audio ${audio.path}: ${describeError(error)}`
      );
    });
  }

  const { segments, fallbackCount } = await translate(
    deps.translator,
    timed,
    request.targetLanguage,
    context
  );

  context.enter("serializing");
  const subtitleText = serializeSrt(segments);
  try {
    await deps.files.writeText(request.destinationPath, subtitleText);
  } catch (error) {
    throw new ResourceError(
      `Failed to write subtitles to ${request.destinationPath}: ${describeError(error)}`,
      request.destinationPath,
      { cause: error }
    );
  }
  context.progress(`SRT file saved to ${request.destinationPath}`);

  return {
    subtitleText,
    destinationPath: request.destinationPath,
    segments,
    fallbackCount,
  };
};

/**
 * Media → speech-to-text → per-segment translation → SRT file, as one task.
 */
export const createTranscriptionTask = (
  deps: TranscriptionPipelineDeps,
  request: TranscriptionRequest
): TranscriptionTask =>
  new PipelineTask<TranscriptionResult, TranscriptionStage>(
    {
      name: "transcription",
      initialStage: "idle",
      doneStage: "done",
      failedStage: "failed",
    },
    (context) => runTranscriptionPipeline(deps, request, context)
  );
