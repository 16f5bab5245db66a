/**
 * Fetcher Types
 * Interface for fetch-and-extract
 */

export interface ExtractOptions {
  /** Whole-request timeout, redirects and body included */
  timeoutMs: number;

  /** Identification header sent with every request */
  userAgent: string;
}

export interface ExtractedDocument {
  /** URL as requested */
  url: string;

  /** URL after redirects */
  finalUrl: string;

  contentType: string;

  /** Plain text */
  text: string;
}

/**
 * Fetch-and-extract capability. Throws FetchError on failure.
 */
export interface IDocumentExtractor {
  extract(url: string, options: ExtractOptions): Promise<ExtractedDocument>;
}
