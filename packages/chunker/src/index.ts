export type { IChunker } from "./chunker.interface.js";
export { WindowChunker } from "./window-chunker.js";
export { FixedChunker } from "./fixed-chunker.js";
export { BoundaryChunker } from "./boundary-chunker.js";
export { createChunker, chunkText } from "./factory.js";
export { validateChunkingConfig } from "./validate.js";
export { reconstructText } from "./reconstruct.js";
