/**
 * Finance Source Lists
 * Publisher allow-list, non-article denylist and fallback homepages
 */

/**
 * Reputable financial publishers. An entry is `host` or `host/path`.
 */
export const TRUSTED_DOMAINS: readonly string[] = [
  "reuters.com",
  "bloomberg.com",
  "wsj.com",
  "ft.com",
  "marketwatch.com",
  "cnbc.com",
  "fool.com",
  "seekingalpha.com",
  "yahoo.com/finance",
  "benzinga.com",
  "investing.com",
  "barrons.com",
  "forbes.com/investing",
  "morningstar.com",
];

/**
 * Video and social platforms never make it into the candidate list
 */
export const EXCLUDED_DOMAINS: readonly string[] = [
  "youtube.com",
  "twitter.com",
  "facebook.com",
  "instagram.com",
  "reddit.com",
  "pinterest.com",
];

/**
 * General financial-news homepages used when no search provider is available
 */
export const FALLBACK_SOURCES: readonly string[] = [
  "https://www.cnbc.com/finance/",
  "https://www.marketwatch.com/",
  "https://finance.yahoo.com/",
  "https://www.reuters.com/business/",
  "https://www.bloomberg.com/",
];

/**
 * Case-insensitive content signals of financial reporting
 */
export const FINANCE_KEYWORDS: readonly string[] = [
  "earnings",
  "revenue",
  "profit",
  "quarter",
  "fiscal",
];
