import type { ChunkResult, ChunkStrategy, ChunkingConfig } from "@sitedocs/types";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(content: string, config: ChunkingConfig): ChunkResult[];
}
