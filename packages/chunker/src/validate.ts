import { ConfigurationError } from "@sitedocs/errors";
import type { ChunkingConfig } from "@sitedocs/types";

/**
 * Throws {@link ConfigurationError} unless `chunkSize` is a positive integer
 * and `overlap` an integer in `[0, chunkSize)`.
 */
export function validateChunkingConfig(config: ChunkingConfig): void {
  const fields: Record<string, string> = {};

  if (!Number.isInteger(config.chunkSize) || config.chunkSize < 1) {
    fields["chunkSize"] = "must be a positive integer";
  }
  if (!Number.isInteger(config.overlap) || config.overlap < 0) {
    fields["overlap"] = "must be a non-negative integer";
  } else if (config.overlap >= config.chunkSize) {
    fields["overlap"] = "must be smaller than chunkSize";
  }

  if (Object.keys(fields).length > 0) {
    throw new ConfigurationError("Invalid chunking configuration", fields, {
      details: { chunkSize: config.chunkSize, overlap: config.overlap },
    });
  }
}
