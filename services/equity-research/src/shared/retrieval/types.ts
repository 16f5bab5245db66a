/**
 * Retrieval Types
 * Chunking and similarity search over fetched documents
 */

/**
 * A span of a document
 */
export interface TextChunk {
  /** Document the span came from */
  source: string;

  content: string;

  /** Position of the span within its document */
  position: number;
}

export interface SplitOptions {
  chunkSize: number;
  chunkOverlap: number;
}

/**
 * Embedding capability
 */
export interface IEmbedder {
  readonly model: string;

  embed(values: string[]): Promise<number[][]>;
}

/**
 * Similarity index, built once per run
 */
export interface IRetrievalIndex {
  readonly size: number;

  /**
   * Chunks closest to the query, best first
   */
  nearest(query: string, k: number): Promise<TextChunk[]>;
}
