import type { ChunkResult, ChunkStrategy, ChunkingConfig } from "@sitedocs/types";
import type { IChunker } from "./chunker.interface.js";
import { validateChunkingConfig } from "./validate.js";

/**
 * Sliding character windows. Each window after the first starts `overlap`
 * characters before the previous one ended, so the windows cover the text
 * with no gaps and nothing is trimmed.
 *
 * Subclasses only decide where a full-size window is cut.
 */
export abstract class WindowChunker implements IChunker {
  abstract readonly strategy: ChunkStrategy;

  /**
   * End offset for the window starting at `start`. Must lie in
   * `(start + overlap, maxEnd]` so that every step makes progress.
   */
  protected abstract cut(content: string, start: number, maxEnd: number, overlap: number): number;

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    validateChunkingConfig(config);
    const { chunkSize, overlap } = config;
    const results: ChunkResult[] = [];

    let start = 0;
    let index = 0;

    while (start < content.length) {
      const maxEnd = Math.min(start + chunkSize, content.length);
      const end = maxEnd === content.length ? maxEnd : this.cut(content, start, maxEnd, overlap);

      results.push({
        content: content.slice(start, end),
        index,
        metadata: { startChar: start, endChar: end, overlap: index === 0 ? 0 : overlap },
      });
      index++;

      if (end === content.length) break;
      start = end - overlap;
    }

    return results;
  }
}
