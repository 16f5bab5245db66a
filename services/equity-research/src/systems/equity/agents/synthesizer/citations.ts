/**
 * Source citation assembly
 */

import type { DocumentScore, FetchedDocument, SourceCitation } from "../../types.js";

/**
 * "Source from <host>"; scheme-less strings use their first path segment
 */
export function citationTitle(source: string): string {
  const host = URL.canParse(source) ? new URL(source).host : "";
  const label = host || source.split("/")[0] || "";
  return label ? `Source from ${label}` : source;
}

/**
 * One citation per distinct source, in first-seen document order.
 * Credibility comes from the first score recorded for the exact source string.
 */
export function buildCitations(
  documents: readonly FetchedDocument[],
  scores: readonly DocumentScore[]
): SourceCitation[] {
  const scoreBySource = new Map<string, DocumentScore>();
  for (const score of scores) {
    if (!scoreBySource.has(score.source)) {
      scoreBySource.set(score.source, score);
    }
  }

  const citations: SourceCitation[] = [];
  const seen = new Set<string>();

  for (const document of documents) {
    if (seen.has(document.source)) continue;
    seen.add(document.source);

    const score = scoreBySource.get(document.source);
    citations.push({
      url: document.source,
      title: citationTitle(document.source),
      index: citations.length + 1,
      ...(score
        ? { credibilityScore: score.credibilityScore, isTrusted: score.isTrusted }
        : {}),
    });
  }

  return citations;
}
