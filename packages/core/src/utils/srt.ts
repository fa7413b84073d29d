import { Segment, createSegment } from "../types/subtitle";
import { describeError } from "./errors";
import { decodeTimestamp, encodeTimestamp } from "./timestamp";

export const TIMING_SEPARATOR = "-->";

const BLOCK_BOUNDARY = /\n(?:[ \t]*\n)+/;

export interface SkippedBlock {
  /** 1-based position among the candidate blocks. */
  block: number;
  reason: string;
}

export interface SrtParseResult {
  segments: Segment[];
  skipped: SkippedBlock[];
}

// A blank line inside cue text would end the block early.
const toCueText = (text: string) =>
  text
    .replace(/\r\n?/g, "\n")
    .replace(/^(?:[ \t]*\n)+/, "")
    .replace(/\n(?:[ \t]*\n)+/g, "\n")
    .trimEnd();

/**
 * Renders segments as SRT text. Blocks are numbered from 1 in sequence order
 * whatever index the input carries; timing is not validated.
 */
export const serializeSrt = (segments: readonly Segment[]): string =>
  segments
    .map(
      (segment, position) =>
        `${position + 1}\n` +
        `${encodeTimestamp(segment.start)} ${TIMING_SEPARATOR} ${encodeTimestamp(segment.end)}\n` +
        `${toCueText(segment.text)}\n\n`
    )
    .join("");

const parseBlock = (
  block: string,
  index: number
): { segment: Segment } | { reason: string } => {
  const lines = block.split("\n");
  if (lines.length < 3) {
    return { reason: `expected at least 3 lines, got ${lines.length}` };
  }

  const timing = lines[1].split(TIMING_SEPARATOR);
  if (timing.length !== 2) {
    return { reason: `malformed timing line "${lines[1]}"` };
  }

  try {
    const start = decodeTimestamp(timing[0].trim());
    const end = decodeTimestamp(timing[1].trim());
    const text = lines.slice(2).join("\n").trim();
    return { segment: createSegment(start, end, text, index) };
  } catch (error) {
    return { reason: describeError(error) };
  }
};

/**
 * Like {@link parseSrt}, but also reports which blocks were dropped.
 */
export const parseSrtDetailed = (content: string): SrtParseResult => {
  const normalized = content.replace(/\r\n?/g, "\n").trim();
  if (!normalized) {
    return { segments: [], skipped: [] };
  }

  const segments: Segment[] = [];
  const skipped: SkippedBlock[] = [];

  normalized.split(BLOCK_BOUNDARY).forEach((block, blockIndex) => {
    const parsed = parseBlock(block, segments.length + 1);
    if ("segment" in parsed) {
      segments.push(parsed.segment);
    } else {
      skipped.push({ block: blockIndex + 1, reason: parsed.reason });
    }
  });

  return { segments, skipped };
};

/**
 * Recovers segments from SRT text. Malformed blocks (fewer than three lines, a
 * timing line without a single `-->`, an undecodable timestamp) are dropped
 * without error. Block order is kept as encountered.
 */
export const parseSrt = (content: string): Segment[] =>
  parseSrtDetailed(content).segments;
