export * from "./types/subtitle";
export * from "./types/transcription";
export * from "./types/translation";
export * from "./types/audio";
export * from "./types/storage";

export * from "./utils/errors";
export * from "./utils/timestamp";
export * from "./utils/srt";

export * from "./audio/clip";
export * from "./audio/timeline";
export * from "./audio/format";

export * from "./task/pipeline-task";

export * from "./pipeline/outcomes";
export * from "./pipeline/transcription-pipeline";
export * from "./pipeline/timeline-synthesizer";
