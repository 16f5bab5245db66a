import { describe, it, expect } from "vitest";
import type { FetchedDocument } from "../../types.js";
import { analysisDepth, formatContext } from "./context.js";

function sized(length: number): FetchedDocument {
  return { source: "https://example.com", content: "a".repeat(length), contentLength: length };
}

describe("formatContext", () => {
  it("should tag and truncate each chunk", () => {
    const context = formatContext(
      [
        { source: "https://www.reuters.com/a", content: "abcdef", position: 0 },
        { source: "https://www.cnbc.com/b", content: "xyz", position: 1 },
      ],
      4
    );

    expect(context).toBe(
      "[Source 1: https://www.reuters.com/a]\nabcd\n\n---\n[Source 2: https://www.cnbc.com/b]\nxyz\n"
    );
  });

  it("should be empty without chunks", () => {
    expect(formatContext([], 400)).toBe("");
  });
});

describe("analysisDepth", () => {
  it("should classify by total characters", () => {
    expect(analysisDepth([sized(6000), sized(4001)])).toBe("Deep");
    expect(analysisDepth([sized(10_000)])).toBe("Moderate");
    expect(analysisDepth([sized(5001)])).toBe("Moderate");
    expect(analysisDepth([sized(5000)])).toBe("Surface");
    expect(analysisDepth([])).toBe("Surface");
  });

  it("should count characters rather than UTF-16 units", () => {
    const chart = { source: "https://example.com", content: "📈".repeat(3000), contentLength: 3000 };

    expect(analysisDepth([chart])).toBe("Surface");
  });
});
