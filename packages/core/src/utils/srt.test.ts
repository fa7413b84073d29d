import { describe, it, expect } from "vitest";
import { createSegment } from "../types/subtitle";
import { parseSrt, parseSrtDetailed, serializeSrt } from "./srt";

describe("srt", () => {
  describe("serializeSrt", () => {
    it("renders numbered blocks separated by blank lines", () => {
      const text = serializeSrt([
        createSegment(0, 1.5, "Hello"),
        createSegment(2, 3.25, "Two\nlines  "),
      ]);

      expect(text).toBe(
        "1\n00:00:00,000 --> 00:00:01,500\nHello\n\n" +
          "2\n00:00:02,000 --> 00:00:03,250\nTwo\nlines\n\n"
      );
    });

    it("renumbers from 1 ignoring the input index", () => {
      const text = serializeSrt([createSegment(1, 2, "Only", 7)]);
      expect(text).toBe("1\n00:00:01,000 --> 00:00:02,000\nOnly\n\n");
    });

    it("does not validate timing", () => {
      const text = serializeSrt([createSegment(5, 4, "Backwards")]);
      expect(text).toBe("1\n00:00:05,000 --> 00:00:04,000\nBackwards\n\n");
    });

    it("returns an empty string for no segments", () => {
      expect(serializeSrt([])).toBe("");
    });

    it("collapses blank lines inside the text", () => {
      const text = serializeSrt([createSegment(0, 1, "\n a\n\n \t\nb\r\n\r\nc")]);

      expect(text).toBe("1\n00:00:00,000 --> 00:00:01,000\n a\nb\nc\n\n");
    });

    it("keeps multi-paragraph text in one block through a round trip", () => {
      const parsed = parseSrt(
        serializeSrt([createSegment(0, 1, "a\n\nb"), createSegment(2, 3, "c")])
      );

      expect(parsed).toEqual([
        { index: 1, start: 0, end: 1, text: "a\nb" },
        { index: 2, start: 2, end: 3, text: "c" },
      ]);
    });
  });

  describe("parseSrt", () => {
    it("parses well-formed blocks in order", () => {
      const segments = parseSrt(
        "1\n00:00:01,000 --> 00:00:02,500\nHello there\n\n" +
          "2\n00:00:03,000 --> 00:00:04,000\nSecond\nline two\n"
      );

      expect(segments).toEqual([
        { index: 1, start: 1, end: 2.5, text: "Hello there" },
        { index: 2, start: 3, end: 4, text: "Second\nline two" },
      ]);
    });

    it("round-trips serialized segments", () => {
      const original = [
        createSegment(0, 1.234, "First"),
        createSegment(1.5, 3, "Second\nwith two lines"),
        createSegment(3661.234, 3662, "Third  "),
      ];

      expect(parseSrt(serializeSrt(original))).toEqual([
        { index: 1, start: 0, end: 1.234, text: "First" },
        { index: 2, start: 1.5, end: 3, text: "Second\nwith two lines" },
        { index: 3, start: 3661.234, end: 3662, text: "Third" },
      ]);
    });

    it("skips malformed blocks and keeps the rest", () => {
      const content = [
        "1\n00:00:01,000 --> 00:00:02,000\nFirst",
        "2\n00:00:03,000 00:00:04,000\nNo separator",
        "3\n00:00:05,000 --> 00:00:06,000",
        "4\nbad --> 00:00:08,000\nBad stamp",
        "5\n00:00:09,000 --> 00:00:10,500\nLast\nline",
      ].join("\n\n");

      const { segments, skipped } = parseSrtDetailed(content);

      expect(segments).toEqual([
        { index: 1, start: 1, end: 2, text: "First" },
        { index: 2, start: 9, end: 10.5, text: "Last\nline" },
      ]);
      expect(skipped).toEqual([
        { block: 2, reason: 'malformed timing line "00:00:03,000 00:00:04,000"' },
        { block: 3, reason: "expected at least 3 lines, got 2" },
        { block: 4, reason: 'Invalid timestamp: "bad"' },
      ]);
    });

    it("skips a timing line with more than one separator", () => {
      const segments = parseSrt(
        "1\n00:00:01,000 --> 00:00:02,000 --> 00:00:03,000\nToo many arrows\n"
      );
      expect(segments).toEqual([]);
    });

    it("handles CRLF line endings", () => {
      const segments = parseSrt(
        "1\r\n00:00:01,000 --> 00:00:02,000\r\nHi\r\n\r\n"
      );
      expect(segments).toEqual([{ index: 1, start: 1, end: 2, text: "Hi" }]);
    });

    it("treats runs of blank or whitespace-only lines as one boundary", () => {
      const segments = parseSrt(
        "1\n00:00:00,000 --> 00:00:01,000\nA\n \n\n\n" +
          "2\n00:00:01,000 --> 00:00:02,000\nB\n"
      );
      expect(segments.map((segment) => segment.text)).toEqual(["A", "B"]);
    });

    it("keeps out-of-order blocks as encountered and renumbers them", () => {
      const segments = parseSrt(
        "10\n00:00:05,000 --> 00:00:06,000\nLater\n\n" +
          "3\n00:00:01,000 --> 00:00:02,000\nEarlier\n"
      );
      expect(segments).toEqual([
        { index: 1, start: 5, end: 6, text: "Later" },
        { index: 2, start: 1, end: 2, text: "Earlier" },
      ]);
    });

    it("returns an empty sequence when nothing is valid", () => {
      expect(parseSrt("")).toEqual([]);
      expect(parseSrt("   \n\n  ")).toEqual([]);
      expect(parseSrt("just some text\nwith lines")).toEqual([]);
    });
  });
});
