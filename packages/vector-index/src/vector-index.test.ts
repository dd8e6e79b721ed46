import { afterEach, describe, it, expect, vi } from "vitest";
import { QdrantClient } from "@qdrant/js-client-rest";
import { ExternalServiceError } from "@wikindex/errors";
import type { VectorPoint } from "@wikindex/types";
import { createVectorIndex, InMemoryVectorIndex, QdrantVectorIndex } from "./index.js";
import { toCollectionState } from "./collection-info.js";

const qdrantConfig = {
  url: "http://localhost:6333",
  apiKey: "test-secret",
  collection: "wiki_test",
  timeoutMs: 1000,
  indexingThreshold: 20000,
};

function point(id: string, vector: VectorPoint["vector"] = [0.1, 0.2]): VectorPoint {
  return {
    id,
    vector,
    payload: { text: `text ${id}`, title: "T", chunk_index: 0, passage_id: `T_${id}` },
  };
}

describe("Vector Index", () => {
  describe("createVectorIndex factory", () => {
    it("creates QdrantVectorIndex for type 'qdrant'", () => {
      const index = createVectorIndex({ type: "qdrant", qdrant: qdrantConfig });
      expect(index).toBeInstanceOf(QdrantVectorIndex);
    });

    it("creates InMemoryVectorIndex for type 'memory'", () => {
      expect(createVectorIndex({ type: "memory" })).toBeInstanceOf(InMemoryVectorIndex);
    });

    it("throws for missing qdrant config", () => {
      expect(() => createVectorIndex({ type: "qdrant" })).toThrow("qdrant config is required");
    });
  });

  describe("InMemoryVectorIndex", () => {
    it("creates a collection with indexing disabled", async () => {
      const index = new InMemoryVectorIndex();
      await index.createCollection("c", { dimension: 2, distance: "Cosine", indexingEnabled: false });

      expect(await index.listCollections()).toEqual(["c"]);
      expect(await index.getCollection("c")).toEqual({
        pointCount: 0,
        dimension: 2,
        distance: "Cosine",
        indexingEnabled: false,
      });
    });

    it("overwrites points with the same id", async () => {
      const index = new InMemoryVectorIndex();
      await index.createCollection("c", { dimension: 2, distance: "Cosine" });

      await index.upsert("c", [point("a"), point("b")], { wait: false });
      await index.upsert("c", [point("a", [0.3, 0.4])], { wait: true });

      expect((await index.getCollection("c")).pointCount).toBe(2);
      expect(index.points("c")[0]?.vector).toEqual([0.3, 0.4]);
      expect(index.upsertCalls).toEqual([
        { collection: "c", count: 2, wait: false },
        { collection: "c", count: 1, wait: true },
      ]);
    });

    it("accepts inference documents regardless of dimension", async () => {
      const index = new InMemoryVectorIndex();
      await index.createCollection("c", { dimension: 384, distance: "Cosine" });

      await index.upsert("c", [point("a", { text: "hello", model: "m" })], { wait: true });
      expect((await index.getCollection("c")).pointCount).toBe(1);
    });

    it("rejects a vector of the wrong dimension", async () => {
      const index = new InMemoryVectorIndex();
      await index.createCollection("c", { dimension: 3, distance: "Cosine" });

      await expect(index.upsert("c", [point("a")], { wait: true })).rejects.toThrow(
        "Vector dimension error: expected dim: 3, got 2",
      );
      expect((await index.getCollection("c")).pointCount).toBe(0);
    });

    it("toggles the indexing threshold", async () => {
      const index = new InMemoryVectorIndex();
      await index.createCollection("c", { dimension: 2, distance: "Dot" });
      expect((await index.getCollection("c")).indexingEnabled).toBe(true);

      await index.setIndexingThreshold("c", 0);
      expect((await index.getCollection("c")).indexingEnabled).toBe(false);
      expect(index.thresholdUpdates).toEqual([{ collection: "c", threshold: 0 }]);
    });

    it("throws ExternalServiceError for an unknown collection", async () => {
      const index = new InMemoryVectorIndex();
      await expect(index.getCollection("nope")).rejects.toBeInstanceOf(ExternalServiceError);
    });

    it("forgets a deleted collection", async () => {
      const index = new InMemoryVectorIndex();
      await index.createCollection("c", { dimension: 2, distance: "Cosine" });
      await index.deleteCollection("c");
      expect(await index.listCollections()).toEqual([]);
    });
  });

  describe("toCollectionState", () => {
    it("reads an unnamed vector config", () => {
      const state = toCollectionState("c", {
        points_count: 4096,
        config: {
          params: { vectors: { size: 384, distance: "Cosine" } },
          optimizer_config: { indexing_threshold: 0 },
        },
      });
      expect(state).toEqual({
        pointCount: 4096,
        dimension: 384,
        distance: "Cosine",
        indexingEnabled: false,
      });
    });

    it("reads the first named vector and treats a missing threshold as enabled", () => {
      const state = toCollectionState("c", {
        points_count: null,
        config: {
          params: { vectors: { dense: { size: 1024, distance: "Dot" } } },
          optimizer_config: {},
        },
      });
      expect(state).toEqual({
        pointCount: 0,
        dimension: 1024,
        distance: "Dot",
        indexingEnabled: true,
      });
    });

    it("rejects a collection without dense vectors", () => {
      expect(() =>
        toCollectionState("c", { config: { params: {}, optimizer_config: {} } }),
      ).toThrow("Collection c has no dense vector config");
    });
  });

  describe("QdrantVectorIndex", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("wraps client failures as ExternalServiceError", async () => {
      vi.spyOn(QdrantClient.prototype, "getCollections").mockRejectedValue(
        new Error("connect ECONNREFUSED"),
      );
      const index = new QdrantVectorIndex(qdrantConfig);

      const err = await index.listCollections().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ExternalServiceError);
      if (err instanceof ExternalServiceError) {
        expect(err.service).toBe("qdrant");
        expect(err.message).toBe("Qdrant list collections failed: connect ECONNREFUSED");
      }
    });

    it("reports an unreachable server as unhealthy", async () => {
      vi.spyOn(QdrantClient.prototype, "getCollections").mockRejectedValue(new Error("down"));
      expect(await new QdrantVectorIndex(qdrantConfig).healthCheck()).toBe(false);
    });

    it("passes the wait flag and payload fields through to upsert", async () => {
      const upsert = vi
        .spyOn(QdrantClient.prototype, "upsert")
        .mockResolvedValue({ operation_id: 1, status: "acknowledged" });
      const index = new QdrantVectorIndex(qdrantConfig);

      await index.upsert("c", [point("a")], { wait: false });
      expect(upsert).toHaveBeenCalledWith("c", {
        wait: false,
        points: [
          {
            id: "a",
            vector: [0.1, 0.2],
            payload: { text: "text a", title: "T", chunk_index: 0, passage_id: "T_a" },
          },
        ],
      });
    });

    it("skips empty upserts", async () => {
      const upsert = vi.spyOn(QdrantClient.prototype, "upsert");
      await new QdrantVectorIndex(qdrantConfig).upsert("c", [], { wait: true });
      expect(upsert).not.toHaveBeenCalled();
    });
  });
});
