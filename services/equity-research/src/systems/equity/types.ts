/**
 * Equity Research Types
 * Records passed forward between pipeline stages
 */

import type { ActivityEvent, ActivityListener } from "../../shared/observability/types.js";

// ============================================
// QUERY INTERPRETER
// ============================================

/**
 * Structured reading of the user's query. Always fully populated.
 */
export interface ResearchIntent {
  companyName: string;

  /** May be empty */
  ticker: string;

  /** Tag such as "earnings_analysis" or "general_research" */
  researchIntent: string;

  keyTopics: string[];
  timeFrame: string;

  /** 1-7 entries */
  searchQueries: string[];
}

// ============================================
// FETCHER
// ============================================

export interface FetchedDocument {
  source: string;
  content: string;
  contentLength: number;
}

// ============================================
// CREDIBILITY
// ============================================

export interface DocumentScore {
  source: string;

  /** Integer in [0, 100] */
  credibilityScore: number;

  /** Signals that fired */
  reason: string;

  isTrusted: boolean;
}

export interface ValidationReport {
  /** In [0, 100], two decimals */
  overallConfidence: number;

  documentScores: DocumentScore[];

  /** Documents from trusted publishers */
  trustedSources: number;

  /** Documents considered */
  totalSources: number;

  validationNotes: string[];
}

// ============================================
// REPORT
// ============================================

export interface SourceCitation {
  url: string;
  title: string;

  /** 1-based, first-seen order */
  index: number;

  credibilityScore?: number;
  isTrusted?: boolean;
}

export type AnalysisDepth = "Deep" | "Moderate" | "Surface" | "None";

export interface ReportMetadata {
  totalSources: number;
  trustedSources: number;
  analysisDepth: AnalysisDepth;
  sourcesAnalyzed: string[];
}

export interface Report {
  title: string;
  generatedAt: string;
  company: string;
  ticker: string;
  researchType: string;
  content: string;
  confidenceScore: number;
  sources: SourceCitation[];
  validationNotes: string[];
  metadata: ReportMetadata;
}

// ============================================
// SYSTEM INPUT / OUTPUT
// ============================================

export type RunMode = "autonomous" | "urls";

export interface EquityResearchInput {
  /** Free-text research question */
  query: string;

  /** Analyze these URLs instead of discovering sources */
  urls?: string[];

  /** Live activity subscriber */
  onEvent?: ActivityListener;
}

export interface PipelineResult {
  runId: string;
  query: string;
  mode: RunMode;
  intent: ResearchIntent;
  candidateUrls: string[];
  documents: FetchedDocument[];
  validation: ValidationReport;
  report: Report;
  events: ActivityEvent[];
  durationMs: number;
}
