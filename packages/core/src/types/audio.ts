export const SUPPORTED_CONTAINER_FORMATS = ["mp3", "wav"] as const;

export type AudioContainerFormat = (typeof SUPPORTED_CONTAINER_FORMATS)[number];

export interface AudioFormat {
  sampleRate: number;
  channelCount: number;
}

/** Planar PCM, one Float32Array per channel with samples in [-1, 1]. */
export interface AudioClip {
  sampleRate: number;
  channels: Float32Array[];
}

export interface SynthesisBackend {
  readonly name: string;
  synthesize(text: string, targetLanguage: string): Promise<AudioClip>;
}

export type SynthesisOutcome =
  | { kind: "synthesized"; clip: AudioClip }
  | { kind: "failed"; warning: string };

export type AudioEncoder = (
  clip: AudioClip,
  format: AudioContainerFormat
) => Promise<Uint8Array>;
