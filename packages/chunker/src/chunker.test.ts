import { describe, it, expect } from "vitest";
import type { Paper } from "@scholarqa/types";
import { ValidationError } from "@scholarqa/errors";
import { ParagraphChunker } from "./paragraph-chunker.js";
import { countWords, splitParagraphs } from "./text.js";

function words(count: number, word = "cell"): string {
  return Array.from({ length: count }, () => word).join(" ");
}

function makePaper(paragraphs: string[], overrides: Partial<Paper> = {}): Paper {
  return {
    id: "paper-1",
    title: "Membrane transport in archaea",
    text: paragraphs.join("\n\n"),
    metadata: { authors: ["A. Author", "B. Author"], url: "https://example.org/paper-1" },
    ...overrides,
  };
}

describe("splitParagraphs", () => {
  it("splits on blank lines, including lines holding only whitespace", () => {
    expect(splitParagraphs("one\n\ntwo\n   \nthree")).toEqual(["one", "two", "three"]);
  });

  it("keeps single line breaks inside a paragraph", () => {
    expect(splitParagraphs("line a\nline b\n\nnext")).toEqual(["line a\nline b", "next"]);
  });

  it("drops empty paragraphs", () => {
    expect(splitParagraphs("\n\n\nonly\n\n\n")).toEqual(["only"]);
    expect(splitParagraphs("")).toEqual([]);
  });
});

describe("countWords", () => {
  it("counts whitespace-separated words", () => {
    expect(countWords("  alpha beta\n\ngamma\tdelta ")).toBe(4);
    expect(countWords("")).toBe(0);
  });
});

describe("ParagraphChunker", () => {
  const chunker = new ParagraphChunker();

  it("has strategy 'paragraph-pairs'", () => {
    expect(chunker.strategy).toBe("paragraph-pairs");
  });

  it("returns no chunks for a paper with fewer than two paragraphs", () => {
    expect(chunker.chunk(makePaper([words(200)]))).toEqual([]);
    expect(chunker.chunk(makePaper([]))).toEqual([]);
  });

  it("pairs five 40-word paragraphs into three non-overlapping chunks", () => {
    const paragraphs = [0, 1, 2, 3, 4].map((i) => words(40, `p${String(i)}`));
    const chunks = chunker.chunk(makePaper(paragraphs));

    expect(chunks.map((c) => c.paragraphs)).toEqual([
      { start: 0, end: 1 },
      { start: 2, end: 3 },
      { start: 4, end: 4 },
    ]);
    expect(chunks.map((c) => c.wordCount)).toEqual([80, 80, 40]);
    expect(chunks[2]?.content).toBe(paragraphs[4]);
    expect(chunks[0]?.content).toBe(`${paragraphs[0] ?? ""}\n\n${paragraphs[1] ?? ""}`);
  });

  it("drops a trailing single paragraph at or below the threshold", () => {
    const chunks = chunker.chunk(makePaper([words(40), words(40), words(20)]));

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.paragraphs).toEqual({ start: 0, end: 1 });
  });

  it("excludes a window of exactly 30 words and includes one of 31", () => {
    const exact = chunker.chunk(makePaper([words(15), words(15)]));
    const above = chunker.chunk(makePaper([words(15), words(16)]));

    expect(exact).toEqual([]);
    expect(above).toHaveLength(1);
    expect(above[0]?.wordCount).toBe(31);
  });

  it("numbers kept chunks consecutively and derives ids from the paper", () => {
    const chunks = chunker.chunk(makePaper([words(5), words(5), words(40), words(1)]));

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.index).toBe(0);
    expect(chunks[0]?.id).toBe("paper-1#0");
    expect(chunks[0]?.paragraphs).toEqual({ start: 2, end: 3 });
  });

  it("attaches a frozen citation of the owning paper", () => {
    const [chunk] = chunker.chunk(
      makePaper([words(20), words(20)], { metadata: { authors: ["C. Author"], publicationId: "10.1000/x" } }),
    );

    expect(chunk?.paperId).toBe("paper-1");
    expect(chunk?.source).toEqual({
      paperId: "paper-1",
      title: "Membrane transport in archaea",
      authors: ["C. Author"],
      url: undefined,
      publicationId: "10.1000/x",
    });
    expect(Object.isFrozen(chunk?.source)).toBe(true);
  });

  it("every chunk exceeds the minimum word count", () => {
    const paragraphs = [3, 50, 12, 9, 31, 0, 44, 2].map((n) => words(n || 1));
    const chunks = chunker.chunk(makePaper(paragraphs));

    expect(chunks.length).toBeGreaterThan(0);
    for (const chunk of chunks) {
      expect(countWords(chunk.content)).toBeGreaterThan(30);
    }
  });

  it("honours a custom window size and threshold", () => {
    const custom = new ParagraphChunker({ paragraphsPerChunk: 3, minWords: 10 });
    const chunks = custom.chunk(makePaper([words(4), words(4), words(4), words(11)]));

    expect(chunks.map((c) => c.paragraphs)).toEqual([
      { start: 0, end: 2 },
      { start: 3, end: 3 },
    ]);
  });

  it("rejects invalid configuration", () => {
    expect(() => new ParagraphChunker({ paragraphsPerChunk: 0 })).toThrow(ValidationError);
    expect(() => new ParagraphChunker({ minWords: -1 })).toThrow("Invalid chunking config");
  });
});
