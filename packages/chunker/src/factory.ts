import type { ChunkResult, ChunkStrategy, ChunkingConfig } from "@sitedocs/types";
import type { IChunker } from "./chunker.interface.js";
import { FixedChunker } from "./fixed-chunker.js";
import { BoundaryChunker } from "./boundary-chunker.js";

export function createChunker(strategy: ChunkStrategy): IChunker {
  switch (strategy) {
    case "fixed":
      return new FixedChunker();
    case "boundary":
      return new BoundaryChunker();
    default:
      throw new Error(`Unknown chunking strategy: ${String(strategy)}`);
  }
}

export function chunkText(content: string, config: ChunkingConfig): ChunkResult[] {
  return createChunker(config.strategy).chunk(content, config);
}
