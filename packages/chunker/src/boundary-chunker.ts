import { WindowChunker } from "./window-chunker.js";

const WHITESPACE = /\s/;

/**
 * Moves the cut back to just after the last whitespace in the window, so
 * words and table cells are not split, as long as the window stays longer
 * than the overlap. Falls back to a hard cut for long unbroken runs.
 */
export class BoundaryChunker extends WindowChunker {
  override readonly strategy = "boundary" as const;

  protected override cut(content: string, start: number, maxEnd: number, overlap: number): number {
    for (let pos = maxEnd - 1; pos >= start + overlap; pos--) {
      if (WHITESPACE.test(content.charAt(pos))) {
        return pos + 1;
      }
    }
    return maxEnd;
  }
}
