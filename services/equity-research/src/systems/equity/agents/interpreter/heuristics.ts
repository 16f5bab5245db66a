/**
 * Interpreter fallbacks: heuristic parse of the raw query and field defaults
 */

import type { ResearchIntent } from "../../types.js";
import type { RawResearchIntent } from "./schema.js";

export const MAX_SEARCH_QUERIES = 7;

export const INTENT_DEFAULTS = {
  companyName: "Unknown",
  ticker: "",
  researchIntent: "general_research",
  timeFrame: "recent",
} as const;

export function genericQueries(company: string): string[] {
  return [
    `${company} latest news`,
    `${company} stock analysis`,
    `${company} earnings`,
  ];
}

/**
 * Capitalized tokens longer than two characters are company candidates
 */
export function companyCandidates(query: string): string[] {
  return query
    .split(/\s+/)
    .map((token) => token.replace(/[?!.,;:]+$/, ""))
    .filter((token) => token.length > 2 && /^\p{Lu}/u.test(token));
}

/**
 * Local parse used when the completion path yields nothing usable
 */
export function heuristicIntent(query: string): RawResearchIntent {
  const candidates = companyCandidates(query);
  const companyName = candidates.length > 0
    ? candidates.slice(0, 2).join(" ")
    : "Unknown Company";

  return {
    company_name: companyName,
    ticker: "",
    research_intent: "general_research",
    key_topics: ["latest news", "financial performance"],
    time_frame: "recent",
    search_queries: genericQueries(companyName),
  };
}

function text(value: string | null | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

function list(values: string[] | null | undefined): string[] {
  return (values ?? []).map((v) => v.trim()).filter((v) => v.length > 0);
}

/**
 * Fill falsy fields with defaults and guarantee 1-7 search queries
 */
export function finalizeIntent(raw: RawResearchIntent): ResearchIntent {
  const companyName = text(raw.company_name, INTENT_DEFAULTS.companyName);

  let searchQueries = list(raw.search_queries);
  if (searchQueries.length === 0) {
    searchQueries = genericQueries(companyName);
  }

  return {
    companyName,
    ticker: text(raw.ticker, INTENT_DEFAULTS.ticker),
    researchIntent: text(raw.research_intent, INTENT_DEFAULTS.researchIntent),
    keyTopics: list(raw.key_topics),
    timeFrame: text(raw.time_frame, INTENT_DEFAULTS.timeFrame),
    searchQueries: searchQueries.slice(0, MAX_SEARCH_QUERIES),
  };
}
