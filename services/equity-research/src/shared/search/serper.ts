/**
 * Serper Search Provider
 * Google organic results via google.serper.dev
 */

import { SearchProviderError, errorMessage } from "@equisight/core";
import type { ISearchProvider, SearchOptions, SearchResult } from "./types.js";

type SerperResult = {
  title?: string;
  link?: string;
  snippet?: string;
};

type SerperResponse = {
  organic?: SerperResult[];
};

const SERPER_ENDPOINT = "https://google.serper.dev/search";
const PROVIDER = "serper";

export class SerperSearchProvider implements ISearchProvider {
  readonly name = PROVIDER;

  constructor(private readonly apiKey: string) {}

  async search(query: string, options: SearchOptions): Promise<SearchResult[]> {
    let res: Response;
    try {
      res = await fetch(SERPER_ENDPOINT, {
        method: "POST",
        headers: {
          "X-API-KEY": this.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ q: query, num: Math.min(options.maxResults, 10) }),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (error) {
      throw new SearchProviderError(`Search request failed: ${errorMessage(error)}`, PROVIDER, {
        cause: error,
        context: { query },
      });
    }

    if (!res.ok) {
      throw new SearchProviderError(`Search returned HTTP ${res.status}`, PROVIDER, {
        status: res.status,
        context: { query },
      });
    }

    const data = (await res.json()) as SerperResponse;
    const out: SearchResult[] = [];

    for (const r of data.organic ?? []) {
      if (!r.link) continue;
      out.push({
        url: r.link,
        title: r.title ?? null,
        snippet: r.snippet ?? null,
      });
      if (out.length >= options.maxResults) break;
    }

    return out;
  }
}

/**
 * Create the search provider, or null when no key is configured
 */
export function createSearchProvider(apiKey: string | undefined): ISearchProvider | null {
  if (!apiKey) return null;
  return new SerperSearchProvider(apiKey);
}
