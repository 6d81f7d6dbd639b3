import { NotFoundError } from "@sitedocs/errors";
import type { IFileStorage } from "@sitedocs/storage";
import type { PdfTextLoader } from "@sitedocs/parser";

const PDF_HEADER = "%PDF-1.7\n";

/** Bytes that pass the PDF header check and carry `text` after it. */
export function pdfBytes(text: string): Uint8Array {
  return new TextEncoder().encode(PDF_HEADER + text);
}

/** Reads back whatever {@link pdfBytes} wrote; form feeds split pages. */
export const fakePdfLoader: PdfTextLoader = async (data) => {
  const pages = new TextDecoder().decode(data).slice(PDF_HEADER.length).split("\f");
  return { pages, pageCount: pages.length };
};

export class InMemoryFileStorage implements IFileStorage {
  private readonly files = new Map<string, Uint8Array>();
  readonly reads: string[] = [];

  put(path: string, bytes: Uint8Array): void {
    this.files.set(path, bytes);
  }

  async read(path: string): Promise<Uint8Array> {
    this.reads.push(path);
    const bytes = this.files.get(path);
    if (!bytes) throw new NotFoundError(`File ${path} not found`);
    return bytes;
  }
}
