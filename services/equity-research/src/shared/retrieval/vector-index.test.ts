import { describe, it, expect } from "vitest";
import { FakeEmbedder, MemoryStore } from "../../systems/equity/harness/fakes.js";
import type { IEmbedder } from "./types.js";
import { VectorIndex, loadIndex, saveIndex } from "./vector-index.js";

const split = { chunkSize: 100, chunkOverlap: 0 };

const documents = [
  { source: "https://a.example.com", content: "revenue margin" },
  { source: "https://b.example.com", content: "weather forecast" },
  { source: "https://c.example.com", content: "football goal" },
];

describe("VectorIndex", () => {
  it("should keep document order without an embedder", async () => {
    const index = await VectorIndex.build(documents, split, null);

    expect(index.size).toBe(3);
    expect(await index.nearest("football", 2)).toEqual([
      { source: "https://a.example.com", content: "revenue margin", position: 0 },
      { source: "https://b.example.com", content: "weather forecast", position: 0 },
    ]);
  });

  it("should rank chunks by similarity to the query", async () => {
    const index = await VectorIndex.build(documents, split, new FakeEmbedder());

    const [best] = await index.nearest("football", 1);
    expect(best?.source).toBe("https://c.example.com");

    const ranked = await index.nearest("forecast", 3);
    expect(ranked.map((c) => c.source)).toEqual([
      "https://b.example.com",
      "https://a.example.com",
      "https://c.example.com",
    ]);
  });

  it("should fall back to document order when embedding fails", async () => {
    const broken: IEmbedder = {
      model: "broken",
      embed: () => Promise.reject(new Error("quota exceeded")),
    };

    const index = await VectorIndex.build(documents, split, broken);

    expect((await index.nearest("football", 1))[0]?.source).toBe("https://a.example.com");
  });

  it("should return nothing for k of zero", async () => {
    const index = await VectorIndex.build(documents, split, null);
    expect(await index.nearest("revenue", 0)).toEqual([]);
  });
});

describe("index snapshots", () => {
  it("should restore a saved index with its embeddings", async () => {
    const store = new MemoryStore();
    const embedder = new FakeEmbedder();
    await saveIndex(store, "index", await VectorIndex.build(documents, split, embedder));

    const restored = await loadIndex(store, "index", embedder);

    expect(restored?.size).toBe(3);
    expect((await restored?.nearest("football", 1))?.[0]?.source).toBe("https://c.example.com");
  });

  it("should drop embeddings from a different model", async () => {
    const store = new MemoryStore();
    await saveIndex(store, "index", await VectorIndex.build(documents, split, new FakeEmbedder("model-a")));

    const restored = await loadIndex(store, "index", new FakeEmbedder("model-b"));

    expect((await restored?.nearest("football", 1))?.[0]?.source).toBe("https://a.example.com");
  });

  it("should return null for missing or malformed snapshots", async () => {
    const store = new MemoryStore();
    expect(await loadIndex(store, "index", null)).toBeNull();

    await store.writeJson("index", { version: 2, chunks: [] });
    expect(await loadIndex(store, "index", null)).toBeNull();
  });
});
