import { v5 as uuidv5 } from "uuid";

/** Namespace for chunk point ids. Changing it re-keys every stored vector. */
export const POINT_ID_NAMESPACE = "3b8f2c61-5d4e-4a97-b0c3-7e1f9a2d6c58";

/**
 * Stable point id for a chunk: a v5 UUID of `documentId:chunkIndex`.
 * Qdrant only accepts UUIDs or integers as ids.
 */
export function pointId(documentId: string, chunkIndex: number): string {
  return uuidv5(`${documentId}:${String(chunkIndex)}`, POINT_ID_NAMESPACE);
}
