/**
 * A timed unit of subtitle text. Times are in seconds.
 *
 * `index` is only set on segments recovered from subtitle text, where it is the
 * 1-based position in the parsed sequence. Serialization ignores it.
 */
export interface Segment {
  readonly index?: number;
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

/** Timed text as returned by a speech-to-text backend. */
export interface TimedText {
  start: number;
  end: number;
  text: string;
}

export const createSegment = (
  start: number,
  end: number,
  text: string,
  index?: number
): Segment =>
  Object.freeze(
    index === undefined ? { start, end, text } : { index, start, end, text }
  );
