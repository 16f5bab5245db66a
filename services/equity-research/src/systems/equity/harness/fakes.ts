/**
 * Deterministic stand-ins for every external capability
 * Used by tests and by offline runs of the pipeline
 */

import { FetchError, SearchProviderError } from "@equisight/core";
import type {
  CompletionRequest,
  CompletionResponse,
  ICompletionExecutor,
} from "../../../shared/executor/types.js";
import type {
  ExtractOptions,
  ExtractedDocument,
  IDocumentExtractor,
} from "../../../shared/fetcher/types.js";
import type { IEmbedder } from "../../../shared/retrieval/types.js";
import type { ISearchProvider, SearchOptions, SearchResult } from "../../../shared/search/types.js";
import type { IStore } from "../../../shared/store/types.js";

// ============================================
// EXECUTOR
// ============================================

/** Canned output, or a failure to return as `success: false` */
export type CannedCompletion = string | { error: string };

/**
 * Returns canned completions in order; the last one repeats
 */
export class FakeExecutor implements ICompletionExecutor {
  readonly requests: CompletionRequest[] = [];

  private readonly responses: CannedCompletion[];
  private readonly ready: boolean;

  constructor(responses: CannedCompletion[] = [""], options: { ready?: boolean } = {}) {
    this.responses = responses;
    this.ready = options.ready ?? true;
  }

  isReady(): boolean {
    return this.ready;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);

    const canned =
      this.responses[Math.min(this.requests.length - 1, this.responses.length - 1)] ?? "";

    if (typeof canned === "string") {
      return { success: true, output: canned, durationMs: 0, attempts: 1 };
    }

    return {
      success: false,
      output: "",
      durationMs: 0,
      attempts: 1,
      error: { code: "EXECUTOR_ERROR", message: canned.error },
    };
  }
}

// ============================================
// SEARCH
// ============================================

/**
 * Results keyed by exact query; queries listed in `failing` throw
 */
export class FakeSearch implements ISearchProvider {
  readonly name = "fake";
  readonly queries: string[] = [];

  private readonly results: Record<string, string[]>;
  private readonly failing: Set<string>;

  constructor(results: Record<string, string[]> = {}, failing: string[] = []) {
    this.results = results;
    this.failing = new Set(failing);
  }

  async search(query: string, options: SearchOptions): Promise<SearchResult[]> {
    this.queries.push(query);

    if (this.failing.has(query)) {
      throw new SearchProviderError("Search returned HTTP 500", this.name, { status: 500 });
    }

    return (this.results[query] ?? [])
      .slice(0, options.maxResults)
      .map((url) => ({ url, title: null, snippet: null }));
  }
}

// ============================================
// EXTRACTOR
// ============================================

/**
 * Text keyed by URL; unknown URLs fail like a 404
 */
export class FakeExtractor implements IDocumentExtractor {
  readonly requested: string[] = [];

  private readonly pages: Record<string, string>;

  constructor(pages: Record<string, string> = {}) {
    this.pages = pages;
  }

  async extract(url: string, _options: ExtractOptions): Promise<ExtractedDocument> {
    this.requested.push(url);

    const text = this.pages[url];
    if (text === undefined) {
      throw new FetchError("Fetch failed: 404", url, { status: 404 });
    }

    return { url, finalUrl: url, contentType: "text/html", text };
  }
}

// ============================================
// EMBEDDER
// ============================================

/**
 * Hashed bag-of-words vectors; texts sharing words land close together
 */
export class FakeEmbedder implements IEmbedder {
  readonly model: string;
  calls = 0;

  private readonly dimensions: number;

  constructor(model = "fake-embedding", dimensions = 16) {
    this.model = model;
    this.dimensions = dimensions;
  }

  async embed(values: string[]): Promise<number[][]> {
    this.calls++;
    return values.map((value) => this.vector(value));
  }

  private vector(value: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const word of value.toLowerCase().split(/\W+/)) {
      if (!word) continue;
      let hash = 0;
      for (const char of word) {
        hash = (hash * 31 + char.charCodeAt(0)) % this.dimensions;
      }
      vector[hash] = (vector[hash] ?? 0) + 1;
    }

    return vector;
  }
}

// ============================================
// STORE
// ============================================

/**
 * In-memory store; JSON values are kept serialized so reads return copies
 */
export class MemoryStore implements IStore {
  readonly files = new Map<string, string>();

  private readonly basePath: string;

  constructor(basePath = "/memory") {
    this.basePath = basePath;
  }

  private normalize(key: string): string {
    return /\.[a-z0-9]+$/i.test(key) ? key : `${key}.json`;
  }

  async readJson<T>(key: string): Promise<T | null> {
    const content = await this.readText(key);
    return content === null ? null : (JSON.parse(content) as T);
  }

  async writeJson<T>(key: string, data: T): Promise<void> {
    await this.writeText(key, JSON.stringify(data));
  }

  async readText(key: string): Promise<string | null> {
    return this.files.get(this.normalize(key)) ?? null;
  }

  async writeText(key: string, content: string): Promise<void> {
    this.files.set(this.normalize(key), content);
  }

  async exists(key: string): Promise<boolean> {
    return this.files.has(this.normalize(key));
  }

  async list(prefix?: string): Promise<string[]> {
    const keys = [...this.files.keys()].map((k) => k.replace(/\.json$/, ""));
    return (prefix ? keys.filter((k) => k.startsWith(prefix)) : keys).sort();
  }

  getPath(key: string): string {
    return `${this.basePath}/${this.normalize(key)}`;
  }
}
