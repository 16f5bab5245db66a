import { describe, it, expect } from "vitest";
import type { DocumentScore, FetchedDocument } from "../../types.js";
import { buildCitations, citationTitle } from "./citations.js";

function doc(source: string): FetchedDocument {
  return { source, content: "body", contentLength: 4 };
}

function score(source: string, credibilityScore: number, isTrusted: boolean): DocumentScore {
  return { source, credibilityScore, reason: "", isTrusted };
}

describe("citationTitle", () => {
  it("should name the host", () => {
    expect(citationTitle("https://www.reuters.com/markets/tesla")).toBe("Source from www.reuters.com");
  });

  it("should use the first segment of scheme-less sources", () => {
    expect(citationTitle("reuters.com/markets")).toBe("Source from reuters.com");
  });
});

describe("buildCitations", () => {
  const reuters = "https://www.reuters.com/tesla";
  const blog = "https://blog.example.com/tesla";

  it("should cite each source once in first-seen order", () => {
    const citations = buildCitations(
      [doc(reuters), doc(blog), doc(reuters)],
      [score(reuters, 90, true), score(reuters, 40, false)]
    );

    expect(citations).toEqual([
      { url: reuters, title: "Source from www.reuters.com", index: 1, credibilityScore: 90, isTrusted: true },
      { url: blog, title: "Source from blog.example.com", index: 2 },
    ]);
  });

  it("should return nothing for no documents", () => {
    expect(buildCitations([], [score(reuters, 90, true)])).toEqual([]);
  });
});
