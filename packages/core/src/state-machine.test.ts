import { describe, it, expect } from "vitest";
import type { Document } from "@sitedocs/types";
import { ValidationError } from "@sitedocs/errors";
import {
  assertTransition,
  canTransition,
  firstMissingStage,
  stagesFrom,
  statusForStage,
} from "./state-machine.js";

const at = new Date("2026-01-01T00:00:00Z");

function doc(overrides: Partial<Document> = {}): Document {
  return {
    id: "doc-1",
    pdfName: "a.pdf",
    storagePath: "a.pdf",
    mimeType: "application/pdf",
    pdfType: "unknown",
    status: "pending",
    stageReached: null,
    errorKind: null,
    errorCode: null,
    errorDetail: null,
    extractedText: null,
    pageCount: null,
    pageOffsets: null,
    classificationScores: null,
    entityCount: 0,
    chunkCount: 0,
    entitiesPersistedAt: null,
    vectorsPersistedAt: null,
    cancelRequestedAt: null,
    createdAt: at,
    updatedAt: at,
    ...overrides,
  };
}

describe("canTransition", () => {
  it("allows forward moves and staying put", () => {
    expect(canTransition("pending", "extracting")).toBe(true);
    expect(canTransition("extracting", "embedding")).toBe(true);
    expect(canTransition("embedding", "embedding")).toBe(true);
    expect(canTransition("persisting", "complete")).toBe(true);
  });

  it("rejects backward moves", () => {
    expect(canTransition("embedding", "classifying")).toBe(false);
  });

  it("allows failed from any non-terminal status", () => {
    expect(canTransition("pending", "failed")).toBe(true);
    expect(canTransition("persisting", "failed")).toBe(true);
  });

  it("never leaves a terminal status", () => {
    expect(canTransition("complete", "failed")).toBe(false);
    expect(canTransition("failed", "extracting")).toBe(false);
  });

  it("throws ValidationError from assertTransition", () => {
    expect(() => assertTransition("failed", "complete")).toThrow(ValidationError);
    expect(() => assertTransition("failed", "complete")).toThrow(
      "Illegal status transition failed -> complete",
    );
  });
});

describe("firstMissingStage", () => {
  it("starts from text extraction when no text is stored", () => {
    expect(firstMissingStage(doc())).toBe("extract_text");
  });

  it("moves on as each output is persisted", () => {
    expect(firstMissingStage(doc({ extractedText: "x" }))).toBe("classify");
    expect(
      firstMissingStage(doc({ extractedText: "x", classificationScores: { task_list: 4 } })),
    ).toBe("extract_entities");
    expect(
      firstMissingStage(
        doc({ extractedText: "x", classificationScores: {}, entitiesPersistedAt: at }),
      ),
    ).toBe("chunk");
  });

  it("returns null when both stores are written", () => {
    expect(
      firstMissingStage(
        doc({
          extractedText: "x",
          classificationScores: {},
          entitiesPersistedAt: at,
          vectorsPersistedAt: at,
        }),
      ),
    ).toBeNull();
  });
});

describe("stagesFrom", () => {
  it("runs every stage for a fresh document", () => {
    expect(stagesFrom("extract_text", doc())).toEqual([
      "extract_text",
      "classify",
      "extract_entities",
      "chunk",
      "embed",
      "persist_entities",
      "persist_vectors",
    ]);
  });

  it("skips entity stages once entities are persisted", () => {
    expect(stagesFrom("chunk", doc({ entitiesPersistedAt: at }))).toEqual([
      "chunk",
      "embed",
      "persist_vectors",
    ]);
  });

  it("skips vector stages once vectors are persisted", () => {
    expect(stagesFrom("extract_entities", doc({ vectorsPersistedAt: at }))).toEqual([
      "extract_entities",
      "persist_entities",
    ]);
  });
});

describe("statusForStage", () => {
  it("moves to the stage's status from an earlier one", () => {
    expect(statusForStage("embed", "extracting_entities")).toBe("embedding");
  });

  it("keeps a later status when a resumed run repeats an earlier stage", () => {
    expect(statusForStage("chunk", "persisting")).toBe("persisting");
    expect(statusForStage("embed", "persisting")).toBe("persisting");
  });
});
