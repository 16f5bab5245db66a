/**
 * Equity Research Configuration
 * Extends the base environment schema with pipeline settings
 */

import { z } from "zod";
import {
  baseEnvSchema,
  formatIssues,
  loadBaseConfig,
  ConfigError,
  type BaseConfig,
} from "@equisight/core";
import { TRUSTED_DOMAINS } from "./domains/finance/sources.js";

// ============================================
// ENV SCHEMA
// ============================================

const int = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const ratio = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

export const researchEnvSchema = baseEnvSchema.extend({
  // Completion
  LLM_PROVIDER: z.enum(["anthropic", "openai"]).optional(),
  LLM_MODEL: z.string().optional(),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  SYNTHESIS_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.4),
  MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),

  // Discovery
  MAX_SOURCES: z.coerce.number().int().positive().default(5),
  TRUSTED_DOMAINS: z.string().optional(),
  SEARCH_QUERY_LIMIT: z.coerce.number().int().positive().default(7),
  SEARCH_RESULTS_PER_QUERY: z.coerce.number().int().positive().default(3),
  SEARCH_DELAY_MS: int(500),

  // Fetching
  URL_LOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FETCH_DELAY_MS: int(1000),
  MIN_CONTENT_LENGTH: int(100),

  // Scoring
  MIN_CONFIDENCE_SCORE: ratio(0.6),
  HIGH_CONFIDENCE_THRESHOLD: ratio(0.8),

  // Retrieval
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: int(200),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
  CONTEXT_CHARS_PER_CHUNK: z.coerce.number().int().positive().default(400),
  VECTOR_STORE_PATH: z.string().default("data/vector_store"),

  // Timeouts
  STAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type ResearchEnv = z.infer<typeof researchEnvSchema>;

// ============================================
// CONFIG SHAPE
// ============================================

export type LlmProvider = "anthropic" | "openai";

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  anthropic: "claude-3-5-haiku-latest",
  openai: "gpt-4o-mini",
};

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export interface ResearchConfig extends BaseConfig {
  llm: {
    provider: LlmProvider;
    apiKey?: string;
    model: string;
    temperature: number;
    synthesisTemperature: number;
    maxTokens: number;
    embeddingModel: string;
  };

  discovery: {
    maxSources: number;
    trustedDomains: string[];
    searchQueryLimit: number;
    searchResultsPerQuery: number;
    searchDelayMs: number;
  };

  fetcher: {
    urlLoadTimeoutMs: number;
    fetchDelayMs: number;
    minContentLength: number;
    userAgent: string;
  };

  scoring: {
    minConfidenceScore: number;
    highConfidenceThreshold: number;
  };

  retrieval: {
    chunkSize: number;
    chunkOverlap: number;
    topK: number;
    answerTopK: number;
    contextCharsPerChunk: number;
    vectorStorePath: string;
  };

  stageTimeoutMs: number;
}

/**
 * Provider preference: explicit setting, then whichever key is present
 */
function resolveProvider(env: ResearchEnv): LlmProvider {
  if (env.LLM_PROVIDER) return env.LLM_PROVIDER;
  if (env.ANTHROPIC_API_KEY) return "anthropic";
  return "openai";
}

function parseDomainList(raw: string | undefined): string[] {
  if (!raw) return [...TRUSTED_DOMAINS];

  const domains = raw
    .split(",")
    .map((d) => d.trim().toLowerCase())
    .filter((d) => d.length > 0);

  return domains.length > 0 ? domains : [...TRUSTED_DOMAINS];
}

/**
 * Load and validate research configuration
 */
export function loadResearchConfig(source: NodeJS.ProcessEnv = process.env): ResearchConfig {
  const parseResult = researchEnvSchema.safeParse(source);

  if (!parseResult.success) {
    throw new ConfigError(
      `Configuration validation failed:\n${formatIssues(parseResult.error)}`
    );
  }

  const env = parseResult.data;

  if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
    throw new ConfigError("CHUNK_OVERLAP must be smaller than CHUNK_SIZE", {
      chunkSize: env.CHUNK_SIZE,
      chunkOverlap: env.CHUNK_OVERLAP,
    });
  }

  const base = loadBaseConfig(source);
  const provider = resolveProvider(env);

  return {
    ...base,

    llm: {
      provider,
      apiKey: provider === "anthropic" ? base.keys.anthropic : base.keys.openai,
      model: env.LLM_MODEL || DEFAULT_MODELS[provider],
      temperature: env.LLM_TEMPERATURE,
      synthesisTemperature: env.SYNTHESIS_TEMPERATURE,
      maxTokens: env.MAX_TOKENS,
      embeddingModel: env.EMBEDDING_MODEL,
    },

    discovery: {
      maxSources: env.MAX_SOURCES,
      trustedDomains: parseDomainList(env.TRUSTED_DOMAINS),
      searchQueryLimit: env.SEARCH_QUERY_LIMIT,
      searchResultsPerQuery: env.SEARCH_RESULTS_PER_QUERY,
      searchDelayMs: env.SEARCH_DELAY_MS,
    },

    fetcher: {
      urlLoadTimeoutMs: env.URL_LOAD_TIMEOUT_MS,
      fetchDelayMs: env.FETCH_DELAY_MS,
      minContentLength: env.MIN_CONTENT_LENGTH,
      userAgent: BROWSER_USER_AGENT,
    },

    scoring: {
      minConfidenceScore: env.MIN_CONFIDENCE_SCORE,
      highConfidenceThreshold: env.HIGH_CONFIDENCE_THRESHOLD,
    },

    retrieval: {
      chunkSize: env.CHUNK_SIZE,
      chunkOverlap: env.CHUNK_OVERLAP,
      topK: env.RETRIEVAL_TOP_K,
      answerTopK: 3,
      contextCharsPerChunk: env.CONTEXT_CHARS_PER_CHUNK,
      vectorStorePath: env.VECTOR_STORE_PATH,
    },

    stageTimeoutMs: env.STAGE_TIMEOUT_MS,
  };
}

let researchConfigInstance: ResearchConfig | null = null;

/**
 * Get research configuration (lazy-loaded singleton)
 */
export function getResearchConfig(): ResearchConfig {
  if (!researchConfigInstance) {
    researchConfigInstance = loadResearchConfig();
  }
  return researchConfigInstance;
}

/**
 * Reset config (for testing)
 */
export function resetResearchConfig(): void {
  researchConfigInstance = null;
}
