import type { ParseResult } from "@sitedocs/types";

export interface IParser {
  readonly supportedMimeTypes: string[];
  parse(input: Uint8Array, mimeType: string): Promise<ParseResult>;
}
