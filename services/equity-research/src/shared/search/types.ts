/**
 * Search Types
 * Interface for structured web search
 */

export interface SearchResult {
  url: string;
  title: string | null;
  snippet: string | null;
}

export interface SearchOptions {
  /** Organic results to keep */
  maxResults: number;

  /** Request timeout */
  timeoutMs: number;
}

/**
 * Search provider - one query in, ordered organic results out.
 * Throws SearchProviderError on HTTP failure.
 */
export interface ISearchProvider {
  readonly name: string;

  search(query: string, options: SearchOptions): Promise<SearchResult[]>;
}
