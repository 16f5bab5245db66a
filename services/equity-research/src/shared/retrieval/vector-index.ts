/**
 * Vector Index
 * In-memory similarity index over document chunks, with JSON snapshots
 */

import { z } from "zod";
import { cosineSimilarity } from "ai";
import { errorMessage, logger } from "@equisight/core";
import type { IStore } from "../store/types.js";
import { splitText } from "./splitter.js";
import type { IEmbedder, IRetrievalIndex, SplitOptions, TextChunk } from "./types.js";

const log = logger.child({ component: "vector-index" });

interface IndexedChunk extends TextChunk {
  embedding?: number[];
}

// ============================================
// SNAPSHOT SCHEMA
// ============================================

const IndexSnapshotSchema = z.object({
  version: z.literal(1),
  createdAt: z.string(),
  embeddingModel: z.string().nullable(),
  chunks: z.array(
    z.object({
      source: z.string(),
      content: z.string(),
      position: z.number().int().min(0),
      embedding: z.array(z.number()).optional(),
    })
  ),
});

export type IndexSnapshot = z.infer<typeof IndexSnapshotSchema>;

// ============================================
// INDEX
// ============================================

export class VectorIndex implements IRetrievalIndex {
  private readonly chunks: IndexedChunk[];
  private readonly embedder: IEmbedder | null;

  constructor(chunks: IndexedChunk[], embedder: IEmbedder | null) {
    this.chunks = chunks;
    this.embedder = embedder;
  }

  /**
   * Chunk every document and embed the chunks when an embedder is available
   */
  static async build(
    documents: ReadonlyArray<{ source: string; content: string }>,
    split: SplitOptions,
    embedder: IEmbedder | null
  ): Promise<VectorIndex> {
    const chunks: IndexedChunk[] = documents.flatMap((doc) =>
      splitText(doc.content, split).map((content, position) => ({
        source: doc.source,
        content,
        position,
      }))
    );

    if (embedder && chunks.length > 0) {
      try {
        const embeddings = await embedder.embed(chunks.map((c) => c.content));
        chunks.forEach((chunk, i) => {
          chunk.embedding = embeddings[i];
        });
      } catch (error) {
        log.warn("Embedding failed, index keeps document order", {
          chunks: chunks.length,
          error: errorMessage(error),
        });
      }
    }

    log.debug("Index built", {
      documents: documents.length,
      chunks: chunks.length,
      embedded: chunks.every((c) => c.embedding !== undefined),
    });

    return new VectorIndex(chunks, embedder);
  }

  get size(): number {
    return this.chunks.length;
  }

  async nearest(query: string, k: number): Promise<TextChunk[]> {
    if (k <= 0 || this.chunks.length === 0) return [];

    const ranked = await this.rank(query);
    return ranked.slice(0, k).map(({ source, content, position }) => ({ source, content, position }));
  }

  toSnapshot(): IndexSnapshot {
    return {
      version: 1,
      createdAt: new Date().toISOString(),
      embeddingModel: this.embedder?.model ?? null,
      chunks: this.chunks.map((c) => ({ ...c })),
    };
  }

  static fromSnapshot(snapshot: IndexSnapshot, embedder: IEmbedder | null): VectorIndex {
    // Vectors from another model are not comparable with fresh query vectors
    const compatible = embedder !== null && snapshot.embeddingModel === embedder.model;

    const chunks: IndexedChunk[] = snapshot.chunks.map((c) => ({
      source: c.source,
      content: c.content,
      position: c.position,
      ...(compatible && c.embedding ? { embedding: c.embedding } : {}),
    }));

    return new VectorIndex(chunks, compatible ? embedder : null);
  }

  private async rank(query: string): Promise<IndexedChunk[]> {
    const vectors: number[][] = [];
    for (const chunk of this.chunks) {
      if (!chunk.embedding) return this.chunks;
      vectors.push(chunk.embedding);
    }
    if (!this.embedder) return this.chunks;

    let queryVector: number[] | undefined;
    try {
      [queryVector] = await this.embedder.embed([query]);
    } catch (error) {
      log.warn("Query embedding failed, using document order", { error: errorMessage(error) });
    }
    if (!queryVector) return this.chunks;

    const target = queryVector;
    return this.chunks
      .map((chunk, i) => ({ chunk, score: cosineSimilarity(target, vectors[i] ?? []) }))
      .sort((a, b) => b.score - a.score)
      .map(({ chunk }) => chunk);
  }
}

// ============================================
// PERSISTENCE
// ============================================

export async function saveIndex(store: IStore, key: string, index: VectorIndex): Promise<void> {
  await store.writeJson(key, index.toSnapshot());
}

/**
 * Load a snapshot; null when absent or unreadable
 */
export async function loadIndex(
  store: IStore,
  key: string,
  embedder: IEmbedder | null
): Promise<VectorIndex | null> {
  let raw: unknown;
  try {
    raw = await store.readJson<unknown>(key);
  } catch (error) {
    log.warn("Index snapshot unreadable", { key, error: errorMessage(error) });
    return null;
  }
  if (raw === null) return null;

  const parsed = IndexSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn("Index snapshot has unexpected shape", { key });
    return null;
  }

  return VectorIndex.fromSnapshot(parsed.data, embedder);
}
