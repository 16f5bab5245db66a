/**
 * Source Discovery
 * Search-backed candidate URLs with a static fallback list
 */

import { errorMessage } from "@equisight/core";
import type { ISearchProvider } from "../../../shared/search/types.js";
import type { IActivityChannel } from "../../../shared/observability/types.js";
import { sleep } from "../../../shared/utils/sleep.js";
import { EXCLUDED_DOMAINS, FALLBACK_SOURCES } from "../../../domains/finance/sources.js";
import { prioritizeUrls } from "./filter.js";

const STAGE = "discovery";
const CALLER_QUERY_LIMIT = 4;

export interface DiscoveryDependencies {
  /** Null when no search provider is configured */
  search: ISearchProvider | null;
}

export interface DiscoveryOptions {
  maxSources: number;
  trustedDomains: readonly string[];
  excludedDomains?: readonly string[];
  fallbackSources?: readonly string[];
  searchQueryLimit: number;
  searchResultsPerQuery: number;
  searchDelayMs: number;
  searchTimeoutMs: number;
}

/**
 * Canonical company phrases followed by up to four caller queries
 */
export function buildSearchQueries(
  searchQueries: readonly string[],
  companyName: string,
  limit: number
): string[] {
  return [
    `${companyName} stock analysis financial news`,
    `${companyName} earnings report`,
    `${companyName} investor relations`,
    ...searchQueries.slice(0, CALLER_QUERY_LIMIT),
  ].slice(0, limit);
}

/**
 * Trim user-supplied URLs and drop blanks
 */
export function normalizeUserUrls(urls: readonly string[]): string[] {
  return urls.map((u) => u.trim()).filter((u) => u.length > 0);
}

export async function discoverSources(
  searchQueries: readonly string[],
  companyName: string,
  deps: DiscoveryDependencies,
  options: DiscoveryOptions,
  channel: IActivityChannel
): Promise<string[]> {
  channel.emit(STAGE, "info", "Discovering sources", `Searching for: ${companyName}`);

  const discovered = deps.search
    ? await searchAll(deps.search, buildSearchQueries(searchQueries, companyName, options.searchQueryLimit), options, channel)
    : fallbackSources(options, channel);

  const urls = prioritizeUrls(discovered, {
    trustedDomains: options.trustedDomains,
    excludedDomains: options.excludedDomains ?? EXCLUDED_DOMAINS,
    maxSources: options.maxSources,
  });

  channel.emit(STAGE, "success", `Found ${urls.length} sources`, "URLs ready for analysis");
  channel.metric("discovery.candidates", urls.length);

  return urls;
}

async function searchAll(
  search: ISearchProvider,
  queries: string[],
  options: DiscoveryOptions,
  channel: IActivityChannel
): Promise<string[]> {
  const urls: string[] = [];

  for (const [i, query] of queries.entries()) {
    if (i > 0) {
      await sleep(options.searchDelayMs);
    }

    channel.emit(STAGE, "info", "Searching", query.slice(0, 50));

    try {
      const results = await search.search(query, {
        maxResults: options.searchResultsPerQuery,
        timeoutMs: options.searchTimeoutMs,
      });
      urls.push(...results.slice(0, options.searchResultsPerQuery).map((r) => r.url));
    } catch (error) {
      // One failed query costs its results, nothing more
      channel.emit(STAGE, "warning", "Search error", errorMessage(error).slice(0, 100));
    }
  }

  return urls;
}

function fallbackSources(options: DiscoveryOptions, channel: IActivityChannel): string[] {
  channel.emit(STAGE, "warning", "No search provider configured, using fallback sources");
  return [...(options.fallbackSources ?? FALLBACK_SOURCES)].slice(0, options.maxSources);
}
