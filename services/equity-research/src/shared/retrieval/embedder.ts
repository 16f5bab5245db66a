/**
 * OpenAI Embedder
 * Batched embeddings through the AI SDK
 */

import { embedMany } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import type { IEmbedder } from "./types.js";

export interface AiSdkEmbedderOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class AiSdkEmbedder implements IEmbedder {
  readonly model: string;

  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(options: AiSdkEmbedderOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
  }

  async embed(values: string[]): Promise<number[][]> {
    if (values.length === 0) return [];

    const { embeddings } = await embedMany({
      model: createOpenAI({ apiKey: this.apiKey }).textEmbeddingModel(this.model),
      values,
      maxRetries: 1,
      abortSignal: AbortSignal.timeout(this.timeoutMs),
    });

    return embeddings;
  }
}

/**
 * Create an embedder, or null without an OpenAI key (the index then keeps document order)
 */
export function createEmbedder(
  apiKey: string | undefined,
  model: string,
  timeoutMs: number
): IEmbedder | null {
  if (!apiKey) return null;
  return new AiSdkEmbedder({ apiKey, model, timeoutMs });
}
