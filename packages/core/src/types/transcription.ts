import { TimedText } from "./subtitle";

/** Audio pulled out of a media container, owned by whoever requested it. */
export interface ExtractedAudio {
  path: string;
  durationInSeconds: number;
  dispose(): Promise<void>;
}

export type AudioExtractor = (mediaPath: string) => Promise<ExtractedAudio>;

export interface TranscriptionOutput {
  text: string;
  language?: string;
  segments: TimedText[];
}

export interface SpeechToText {
  readonly name: string;
  /** Loads the model or checks credentials before the first call. */
  prepare?(): Promise<void>;
  transcribe(audio: ExtractedAudio): Promise<TranscriptionOutput>;
}
