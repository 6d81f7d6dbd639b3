/**
 * Normalise text pulled out of a PDF: drop NUL bytes, collapse runs of
 * horizontal whitespace, keep at most one blank line between blocks.
 * Line structure is kept since the extractors read tables row by row.
 */
export function cleanText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/\x00/g, "")
    .replace(/[ \t\f\v]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
