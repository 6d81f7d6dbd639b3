import { cleanText } from "./clean-text.js";

const PAGE_SEPARATOR = "\n\n";

export interface JoinedPages {
  text: string;
  pageOffsets: number[];
}

/**
 * Cleans each page and joins them with a blank line, recording where each
 * page starts. An empty page starts where the next one would.
 */
export function joinPages(pages: readonly string[]): JoinedPages {
  let text = "";
  const pageOffsets: number[] = [];

  for (const page of pages) {
    const cleaned = cleanText(page);
    const separator = text.length > 0 ? PAGE_SEPARATOR : "";
    pageOffsets.push(text.length + separator.length);
    if (cleaned.length > 0) {
      text += separator + cleaned;
    }
  }

  return { text, pageOffsets };
}

/** 1-based page holding `offset`; 1 when no offsets are known. */
export function pageNumberAt(pageOffsets: readonly number[], offset: number): number {
  let page = 1;
  for (const [index, start] of pageOffsets.entries()) {
    if (start > offset) break;
    page = index + 1;
  }
  return page;
}
