export const SPEECH_MODEL = process.env.OPENAI_SPEECH_MODEL ?? "tts-1";

export const DEFAULT_SPEECH_VOICE = "alloy";
