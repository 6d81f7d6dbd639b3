import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@sitedocs/errors";
import type { ChunkingConfig } from "@sitedocs/types";
import { FixedChunker } from "./fixed-chunker.js";
import { BoundaryChunker } from "./boundary-chunker.js";
import { createChunker, chunkText } from "./factory.js";
import { reconstructText } from "./reconstruct.js";
import { validateChunkingConfig } from "./validate.js";

const SAMPLE_TEXT = `BILL OF QUANTITIES
1 Excavation to foundation trenches 120 m3 450.00 54,000.00
2 Concrete grade C25 in strip footings 45 m3 9,800.00 441,000.00
3 Reinforcement bars Y12 2.5 t 3,200,000.00 8,000,000.00

Local Cost
4 Hardcore filling 60 m3 300.00 18,000.00
Total 8,513,000.00`;

const fixed: ChunkingConfig = { strategy: "fixed", chunkSize: 4, overlap: 1 };

describe("FixedChunker", () => {
  const chunker = new FixedChunker();

  it("has strategy 'fixed'", () => {
    expect(chunker.strategy).toBe("fixed");
  });

  it("cuts exact windows that step back by the overlap", () => {
    const results = chunker.chunk("abcdefghij", fixed);

    expect(results.map((c) => c.content)).toEqual(["abcd", "defg", "ghij"]);
    expect(results.map((c) => c.metadata)).toEqual([
      { startChar: 0, endChar: 4, overlap: 0 },
      { startChar: 3, endChar: 7, overlap: 1 },
      { startChar: 6, endChar: 10, overlap: 1 },
    ]);
  });

  it("keeps a short final window", () => {
    const results = chunker.chunk("abcdefgh", fixed);
    expect(results.map((c) => c.content)).toEqual(["abcd", "defg", "gh"]);
  });

  it("handles empty content", () => {
    expect(chunker.chunk("", fixed)).toHaveLength(0);
  });

  it("returns one chunk for text shorter than chunkSize", () => {
    const results = chunker.chunk("ab", fixed);
    expect(results).toEqual([
      { content: "ab", index: 0, metadata: { startChar: 0, endChar: 2, overlap: 0 } },
    ]);
  });

  it("supports zero overlap", () => {
    const results = chunker.chunk("abcdefgh", { ...fixed, overlap: 0 });
    expect(results.map((c) => c.content)).toEqual(["abcd", "efgh"]);
  });
});

describe("BoundaryChunker", () => {
  const chunker = new BoundaryChunker();

  it("has strategy 'boundary'", () => {
    expect(chunker.strategy).toBe("boundary");
  });

  it("cuts after whitespace where possible", () => {
    const results = chunker.chunk("the quick brown fox", {
      strategy: "boundary",
      chunkSize: 8,
      overlap: 2,
    });

    expect(results.map((c) => c.content)).toEqual(["the ", "e quick ", "k brown ", "n fox"]);
    expect(results[3]!.metadata).toEqual({ startChar: 14, endChar: 19, overlap: 2 });
  });

  it("falls back to a hard cut inside long words", () => {
    const results = chunker.chunk("abcdefghij", { strategy: "boundary", chunkSize: 4, overlap: 1 });
    expect(results.map((c) => c.content)).toEqual(["abcd", "defg", "ghij"]);
  });

  it("never shrinks a window to the overlap", () => {
    const results = chunker.chunk("ab cdefgh", { strategy: "boundary", chunkSize: 4, overlap: 2 });
    for (const chunk of results) {
      expect(chunk.content.length).toBeGreaterThan(chunk.metadata.overlap);
    }
  });
});

describe("chunking laws", () => {
  const configs: ChunkingConfig[] = [
    { strategy: "fixed", chunkSize: 40, overlap: 10 },
    { strategy: "boundary", chunkSize: 40, overlap: 10 },
    { strategy: "boundary", chunkSize: 25, overlap: 0 },
    { strategy: "fixed", chunkSize: 7, overlap: 6 },
  ];

  it.each(configs)("reconstructs the original text ($strategy/$chunkSize/$overlap)", (config) => {
    const results = chunkText(SAMPLE_TEXT, config);
    expect(reconstructText(results)).toBe(SAMPLE_TEXT);
  });

  it.each(configs)("covers the text with no gaps ($strategy/$chunkSize/$overlap)", (config) => {
    const results = chunkText(SAMPLE_TEXT, config);

    expect(results[0]!.metadata.startChar).toBe(0);
    expect(results[results.length - 1]!.metadata.endChar).toBe(SAMPLE_TEXT.length);
    for (let i = 1; i < results.length; i++) {
      const prev = results[i - 1]!;
      const curr = results[i]!;
      expect(curr.metadata.startChar).toBe(prev.metadata.endChar - config.overlap);
      expect(curr.content.slice(0, config.overlap)).toBe(prev.content.slice(prev.content.length - config.overlap));
      expect(curr.content.length).toBeLessThanOrEqual(config.chunkSize);
    }
  });

  it("is deterministic", () => {
    const config = configs[1]!;
    expect(chunkText(SAMPLE_TEXT, config)).toEqual(chunkText(SAMPLE_TEXT, config));
  });

  it("numbers chunks sequentially from zero", () => {
    const results = chunkText(SAMPLE_TEXT, configs[0]!);
    expect(results.map((c) => c.index)).toEqual(results.map((_, i) => i));
  });
});

describe("validateChunkingConfig", () => {
  it("accepts a valid config", () => {
    expect(() => validateChunkingConfig({ strategy: "fixed", chunkSize: 10, overlap: 9 })).not.toThrow();
  });

  it("rejects overlap equal to chunkSize", () => {
    expect(() => validateChunkingConfig({ strategy: "fixed", chunkSize: 10, overlap: 10 })).toThrow(
      ConfigurationError,
    );
  });

  it("reports each invalid field", () => {
    try {
      validateChunkingConfig({ strategy: "boundary", chunkSize: 0.5, overlap: -1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({
        fields: {
          chunkSize: "must be a positive integer",
          overlap: "must be a non-negative integer",
        },
      });
    }
  });

  it("is enforced by chunk()", () => {
    expect(() => new FixedChunker().chunk("abc", { strategy: "fixed", chunkSize: 3, overlap: 5 })).toThrow(
      "Invalid chunking configuration",
    );
  });
});

describe("createChunker factory", () => {
  it("creates FixedChunker for 'fixed'", () => {
    expect(createChunker("fixed")).toBeInstanceOf(FixedChunker);
  });

  it("creates BoundaryChunker for 'boundary'", () => {
    expect(createChunker("boundary")).toBeInstanceOf(BoundaryChunker);
  });
});
