import {
  AudioContainerFormat,
  SUPPORTED_CONTAINER_FORMATS,
} from "../types/audio";

const isSupportedFormat = (value: string): value is AudioContainerFormat =>
  SUPPORTED_CONTAINER_FORMATS.some((format) => format === value);

/**
 * Picks the container from the destination's extension. Anything that is not
 * a supported container falls back to the first supported one.
 */
export const resolveContainerFormat = (
  destinationPath: string
): AudioContainerFormat => {
  const basename = destinationPath.split(/[\\/]/).pop() ?? "";
  const dot = basename.lastIndexOf(".");
  const extension = dot > 0 ? basename.slice(dot + 1).toLowerCase() : "";
  return isSupportedFormat(extension)
    ? extension
    : SUPPORTED_CONTAINER_FORMATS[0];
};
