import type { ChunkResult } from "@sitedocs/types";

/** Inverse of chunking: drop each chunk's overlap prefix and concatenate. */
export function reconstructText(chunks: readonly ChunkResult[]): string {
  return chunks.map((c) => c.content.slice(c.metadata.overlap)).join("");
}
