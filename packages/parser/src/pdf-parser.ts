import type { ParseResult } from "@sitedocs/types";
import { UnreadablePdfError, errorMessageOf } from "@sitedocs/errors";
import type { IParser } from "./parser.interface.js";
import { joinPages } from "./pages.js";

const PDF_MIME_TYPES = ["application/pdf"];

/** "%PDF-" */
const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d];

export interface RawPdfText {
  /** Text of each page, in page order. */
  pages: string[];
  pageCount: number;
}

/** Pulls raw text out of PDF bytes. */
export type PdfTextLoader = (data: Uint8Array) => Promise<RawPdfText>;

export const loadWithPdfParse: PdfTextLoader = async (data) => {
  const { PDFParse } = await import("pdf-parse");
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    const pages = result.pages.map((page) => page.text);
    return { pages: pages.length > 0 ? pages : [result.text], pageCount: result.total };
  } finally {
    await parser.destroy();
  }
};

export function hasPdfHeader(input: Uint8Array): boolean {
  return PDF_MAGIC.every((byte, i) => input[i] === byte);
}

/**
 * PDF text extraction. Anything that is not a PDF, fails to open, or yields
 * no text is reported as {@link UnreadablePdfError}.
 */
export class PdfParser implements IParser {
  readonly supportedMimeTypes = PDF_MIME_TYPES;

  constructor(private readonly load: PdfTextLoader = loadWithPdfParse) {}

  async parse(input: Uint8Array, mimeType: string): Promise<ParseResult> {
    if (!hasPdfHeader(input)) {
      throw new UnreadablePdfError("File does not start with a PDF header", {
        details: { mimeType, byteLength: input.byteLength },
      });
    }

    let raw: RawPdfText;
    try {
      raw = await this.load(input);
    } catch (error: unknown) {
      throw new UnreadablePdfError(`PDF could not be opened: ${errorMessageOf(error)}`, {
        cause: error,
      });
    }

    const { text, pageOffsets } = joinPages(raw.pages);
    if (text.length === 0) {
      throw new UnreadablePdfError("PDF contains no extractable text", {
        details: { pageCount: raw.pageCount },
      });
    }

    return {
      text,
      pageCount: raw.pageCount,
      pageOffsets,
      metadata: {
        mimeType,
        charCount: text.length,
        wordCount: text.split(/\s+/).filter((w) => w.length > 0).length,
      },
    };
  }
}
