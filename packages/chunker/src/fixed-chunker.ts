import { WindowChunker } from "./window-chunker.js";

/** Cuts every window at exactly `chunkSize` characters. */
export class FixedChunker extends WindowChunker {
  override readonly strategy = "fixed" as const;

  protected override cut(_content: string, _start: number, maxEnd: number): number {
    return maxEnd;
  }
}
