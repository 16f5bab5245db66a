/**
 * Context block and depth classification for synthesis
 */

import type { TextChunk } from "../../../../shared/retrieval/types.js";
import type { AnalysisDepth, FetchedDocument } from "../../types.js";

export const CONTEXT_DELIMITER = "\n---\n";

/**
 * Source-tagged, length-bounded context from retrieved chunks
 */
export function formatContext(chunks: readonly TextChunk[], charsPerChunk: number): string {
  return chunks
    .map((chunk, i) => `[Source ${i + 1}: ${chunk.source}]\n${chunk.content.slice(0, charsPerChunk)}\n`)
    .join(CONTEXT_DELIMITER);
}

export function analysisDepth(documents: readonly FetchedDocument[]): AnalysisDepth {
  const totalChars = documents.reduce((sum, doc) => sum + [...doc.content].length, 0);

  if (totalChars > 10_000) return "Deep";
  if (totalChars > 5_000) return "Moderate";
  return "Surface";
}
