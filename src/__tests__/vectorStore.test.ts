import { describe, it, expect } from "vitest";
import { VectorStore, cosineSimilarity } from "../retrieval/vectorStore.js";

describe("cosineSimilarity", () => {
  it("is 1 for identical directions and 0 for orthogonal vectors", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
  });

  it("is -1 for opposite vectors", () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it("returns 0 for zero, empty or mismatched vectors", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([1, 0, 0], [1, 0])).toBe(0);
  });
});

describe("VectorStore", () => {
  it("ranks documents by similarity and honours topK", () => {
    const store = new VectorStore();
    store.add([1, 0], "x");
    store.add([0, 1], "y");
    store.add([0.9, 0.1], "z");

    expect(store.search([1, 0])).toEqual(["x", "z", "y"]);
    expect(store.search([1, 0], 2)).toEqual(["x", "z"]);
    expect(store.search([1, 0], 0)).toEqual([]);
  });

  it("defaults to the top 3", () => {
    const store = new VectorStore();
    for (let i = 0; i < 5; i++) store.add([1, i], `doc ${i}`);
    expect(store.search([1, 0])).toHaveLength(3);
  });

  it("keeps insertion order for equal scores", () => {
    const store = new VectorStore();
    store.add([1, 0], "first");
    store.add([2, 0], "second");
    expect(store.search([1, 0])).toEqual(["first", "second"]);
  });

  it("generates ids and replaces documents added under an existing id", () => {
    const store = new VectorStore();
    expect(store.add([1, 0], "a")).toBe("doc-0");
    expect(store.add([0, 1], "b")).toBe("doc-1");

    store.add([1, 1], "old", "notes.md");
    store.add([1, 1], "new", "notes.md");
    expect(store.size()).toBe(3);
    expect(store.getAllDocuments()).toEqual(["a", "b", "new"]);
    expect(store.ids()).toEqual(["doc-0", "doc-1", "notes.md"]);
  });

  it("reports scores alongside documents", () => {
    const store = new VectorStore();
    store.add([0, 1], "y", "y-id");
    expect(store.searchScored([0, 1], 1)).toEqual([{ id: "y-id", document: "y", score: 1 }]);
  });

  it("removes and clears documents", () => {
    const store = new VectorStore();
    store.add([1, 0], "a", "a");
    store.add([0, 1], "b", "b");

    expect(store.remove("a")).toBe(true);
    expect(store.remove("a")).toBe(false);
    expect(store.getAllDocuments()).toEqual(["b"]);

    store.clear();
    expect(store.size()).toBe(0);
    expect(store.search([1, 0])).toEqual([]);
  });
});
