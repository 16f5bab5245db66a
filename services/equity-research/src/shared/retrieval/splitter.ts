/**
 * Recursive Character Splitter
 * Splits on paragraph, line, word, then character boundaries until spans fit
 */

import { ValidationError } from "@equisight/core";
import type { SplitOptions } from "./types.js";

const SEPARATORS = ["\n\n", "\n", " ", ""];

export function splitText(text: string, options: SplitOptions): string[] {
  const { chunkSize, chunkOverlap } = options;

  if (chunkSize <= 0) {
    throw new ValidationError("chunkSize must be positive", { field: "chunkSize" });
  }
  if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ValidationError("chunkOverlap must be in [0, chunkSize)", { field: "chunkOverlap" });
  }

  return splitRecursive(text, SEPARATORS, chunkSize, chunkOverlap);
}

function splitRecursive(
  text: string,
  separators: string[],
  chunkSize: number,
  chunkOverlap: number
): string[] {
  // First separator present in the text; "" always matches
  let sepIndex = separators.findIndex((sep) => sep === "" || text.includes(sep));
  if (sepIndex < 0) sepIndex = separators.length - 1;

  const separator = separators[sepIndex] ?? "";
  const remaining = separators.slice(sepIndex + 1);
  const splits = (separator ? text.split(separator) : [...text]).filter((s) => s !== "");

  const chunks: string[] = [];
  let pending: string[] = [];

  for (const piece of splits) {
    if (piece.length <= chunkSize) {
      pending.push(piece);
      continue;
    }

    if (pending.length > 0) {
      chunks.push(...mergeSplits(pending, separator, chunkSize, chunkOverlap));
      pending = [];
    }

    if (remaining.length === 0) {
      chunks.push(piece);
    } else {
      chunks.push(...splitRecursive(piece, remaining, chunkSize, chunkOverlap));
    }
  }

  if (pending.length > 0) {
    chunks.push(...mergeSplits(pending, separator, chunkSize, chunkOverlap));
  }

  return chunks;
}

/**
 * Greedily pack pieces into chunks, carrying up to `chunkOverlap` characters forward
 */
function mergeSplits(
  pieces: string[],
  separator: string,
  chunkSize: number,
  chunkOverlap: number
): string[] {
  const chunks: string[] = [];
  const current: string[] = [];
  let total = 0;

  const joinedLength = (extra: number) =>
    total + extra + (current.length > 0 ? separator.length : 0);

  for (const piece of pieces) {
    if (joinedLength(piece.length) > chunkSize && current.length > 0) {
      pushChunk(chunks, current, separator);

      while (
        current.length > 0 &&
        (total > chunkOverlap || joinedLength(piece.length) > chunkSize)
      ) {
        const dropped = current.shift() ?? "";
        total -= dropped.length + (current.length > 0 ? separator.length : 0);
      }
    }

    total += piece.length + (current.length > 0 ? separator.length : 0);
    current.push(piece);
  }

  pushChunk(chunks, current, separator);
  return chunks;
}

function pushChunk(chunks: string[], current: string[], separator: string): void {
  const chunk = current.join(separator).trim();
  if (chunk) chunks.push(chunk);
}
