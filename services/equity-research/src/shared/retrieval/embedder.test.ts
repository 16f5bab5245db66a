import { describe, it, expect, vi, beforeEach } from "vitest";

const mocks = vi.hoisted(() => ({ embedMany: vi.fn() }));

vi.mock("ai", () => ({ embedMany: mocks.embedMany }));
vi.mock("@ai-sdk/openai", () => ({
  createOpenAI: () => ({ textEmbeddingModel: (modelId: string) => ({ modelId }) }),
}));

import { AiSdkEmbedder, createEmbedder } from "./embedder.js";

describe("AiSdkEmbedder", () => {
  beforeEach(() => {
    mocks.embedMany.mockReset();
  });

  it("should embed values in one batch", async () => {
    mocks.embedMany.mockResolvedValue({ embeddings: [[1, 0], [0, 1]] });
    const embedder = new AiSdkEmbedder({ apiKey: "test-secret", model: "text-embedding-3-small", timeoutMs: 1000 });

    expect(await embedder.embed(["a", "b"])).toEqual([[1, 0], [0, 1]]);
    expect(mocks.embedMany).toHaveBeenCalledWith(
      expect.objectContaining({
        model: { modelId: "text-embedding-3-small" },
        values: ["a", "b"],
        maxRetries: 1,
      })
    );
  });

  it("should skip the call for no values", async () => {
    const embedder = new AiSdkEmbedder({ apiKey: "test-secret", model: "m", timeoutMs: 1000 });

    expect(await embedder.embed([])).toEqual([]);
    expect(mocks.embedMany).not.toHaveBeenCalled();
  });
});

describe("createEmbedder", () => {
  it("should return null without a key", () => {
    expect(createEmbedder(undefined, "m", 1000)).toBeNull();
    expect(createEmbedder("test-secret", "m", 1000)?.model).toBe("m");
  });
});
