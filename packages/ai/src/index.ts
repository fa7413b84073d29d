export * from "./lib";
export * from "./translate/config";
export * from "./translate/translate-text";
export * from "./transcribe/config";
export * from "./transcribe/transcribe-audio";
export * from "./speech/config";
export * from "./speech/generate-speech";
