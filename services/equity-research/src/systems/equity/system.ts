/**
 * Equity Research System
 * Runs the research pipeline for one query
 *
 * Stages (strictly sequential):
 * 1. Interpreter: free-text query → ResearchIntent
 * 2. Discovery: intent → candidate URLs (or the caller's URLs)
 * 3. Fetcher: URLs → documents
 * 4. Credibility: documents → ValidationReport
 * 5. Synthesizer: everything above → Report
 *
 * Every stage degrades instead of failing; anything that still escapes
 * is turned into the error report at the run boundary.
 */

import { errorMessage, logger } from "@equisight/core";
import { recordRunCompleted, recordRunFailed, recordRunStarted, runRepo } from "@equisight/db";
import type { ResearchConfig } from "../../config.js";
import { EXCLUDED_DOMAINS, FALLBACK_SOURCES } from "../../domains/finance/sources.js";
import { createAiSdkExecutor } from "../../shared/executor/ai-sdk.js";
import type { ICompletionExecutor } from "../../shared/executor/types.js";
import { createHttpExtractor } from "../../shared/fetcher/http.js";
import type { IDocumentExtractor } from "../../shared/fetcher/types.js";
import { createActivityChannel } from "../../shared/observability/channel.js";
import { createSupabaseSinks } from "../../shared/observability/supabase.js";
import type { IActivitySink } from "../../shared/observability/types.js";
import { createEmbedder } from "../../shared/retrieval/embedder.js";
import type { IEmbedder } from "../../shared/retrieval/types.js";
import { loadIndex } from "../../shared/retrieval/vector-index.js";
import { createSearchProvider } from "../../shared/search/serper.js";
import type { ISearchProvider } from "../../shared/search/types.js";
import { createFileStore } from "../../shared/store/file.js";
import type { IStore } from "../../shared/store/types.js";
import { QueryInterpreter } from "./agents/interpreter/agent.js";
import { finalizeIntent, heuristicIntent } from "./agents/interpreter/heuristics.js";
import { ReportSynthesizer } from "./agents/synthesizer/agent.js";
import { ERROR_TITLE, NO_DATA_TITLE, errorReport } from "./agents/synthesizer/reports.js";
import { validateDocuments } from "./stages/credibility.js";
import { discoverSources, normalizeUserUrls } from "./stages/discovery.js";
import { loadDocuments } from "./stages/fetcher.js";
import type {
  EquityResearchInput,
  FetchedDocument,
  PipelineResult,
  Report,
  ResearchIntent,
  RunMode,
  ValidationReport,
} from "./types.js";
import { renderReportMarkdown } from "./utils/markdown.js";

const log = logger.child({ component: "equity-research" });

/** Index snapshot key inside the vector store */
export const INDEX_KEY = "index";

// ============================================
// DEPENDENCIES
// ============================================

export interface EquityResearchDependencies {
  executor: ICompletionExecutor;

  /** Null → fallback source list */
  search: ISearchProvider | null;

  extractor: IDocumentExtractor;

  /** Null → retrieval in document order */
  embedder: IEmbedder | null;

  /** Run summaries and Markdown reports (rooted at DATA_DIR) */
  store: IStore;

  /** Index snapshots (rooted at VECTOR_STORE_PATH) */
  indexStore: IStore;

  /** Outbound activity destinations */
  sinks: IActivitySink[];
}

/**
 * Search provider for the configured key. A provider that cannot be
 * constructed is treated as unavailable.
 */
function initSearch(config: ResearchConfig): ISearchProvider | null {
  try {
    return createSearchProvider(config.keys.serper);
  } catch (error) {
    log.warn("Search provider failed to initialize, using fallback sources", {
      error: errorMessage(error),
    });
    return null;
  }
}

// ============================================
// EQUITY RESEARCH SYSTEM
// ============================================

export class EquityResearchSystem {
  private readonly config: ResearchConfig;
  private readonly deps: EquityResearchDependencies;

  // Internal agents
  private readonly interpreter: QueryInterpreter;
  private readonly synthesizer: ReportSynthesizer;

  constructor(config: ResearchConfig, deps?: Partial<EquityResearchDependencies>) {
    this.config = config;

    this.deps = {
      executor:
        deps?.executor ??
        createAiSdkExecutor({ provider: config.llm.provider, apiKey: config.llm.apiKey }),
      search: deps?.search !== undefined ? deps.search : initSearch(config),
      extractor: deps?.extractor ?? createHttpExtractor(),
      embedder:
        deps?.embedder !== undefined
          ? deps.embedder
          : createEmbedder(config.keys.openai, config.llm.embeddingModel, config.stageTimeoutMs),
      store: deps?.store ?? createFileStore(config.env.dataDir),
      indexStore: deps?.indexStore ?? createFileStore(config.retrieval.vectorStorePath),
      sinks: deps?.sinks ?? createSupabaseSinks(),
    };

    this.interpreter = new QueryInterpreter(
      { executor: this.deps.executor },
      {
        model: config.llm.model,
        temperature: config.llm.temperature,
        maxOutputTokens: config.llm.maxTokens,
        timeoutMs: config.stageTimeoutMs,
      }
    );

    this.synthesizer = new ReportSynthesizer(
      { executor: this.deps.executor, embedder: this.deps.embedder, store: this.deps.indexStore },
      {
        chunkSize: config.retrieval.chunkSize,
        chunkOverlap: config.retrieval.chunkOverlap,
        topK: config.retrieval.topK,
        answerTopK: config.retrieval.answerTopK,
        contextCharsPerChunk: config.retrieval.contextCharsPerChunk,
        indexKey: INDEX_KEY,
      },
      {
        model: config.llm.model,
        temperature: config.llm.synthesisTemperature,
        maxOutputTokens: config.llm.maxTokens,
        timeoutMs: config.stageTimeoutMs,
      }
    );
  }

  /**
   * Run the full pipeline. Never throws; the worst outcome is a report with confidence 0.
   */
  async run(input: EquityResearchInput): Promise<PipelineResult> {
    const startTime = Date.now();
    const runId = crypto.randomUUID();
    const userUrls = normalizeUserUrls(input.urls ?? []);
    const mode: RunMode = input.urls && input.urls.length > 0 ? "urls" : "autonomous";

    const channel = createActivityChannel(runId, {
      onEvent: input.onEvent,
      sinks: this.deps.sinks,
    });

    log.info("Starting research run", { runId, mode, query: input.query.slice(0, 100) });
    await this.track(runId, "start", async () => {
      recordRunStarted(runId, input.query, mode);
      await runRepo.create({ id: runId, query: input.query, mode });
    });

    let intent: ResearchIntent = finalizeIntent(heuristicIntent(input.query));
    let candidateUrls: string[] = [];
    let documents: FetchedDocument[] = [];
    let validation: ValidationReport = {
      overallConfidence: 0,
      documentScores: [],
      trustedSources: 0,
      totalSources: 0,
      validationNotes: [],
    };
    let report: Report;

    try {
      // ========================================
      // STEP 1: Interpret the query
      // ========================================
      intent = await this.interpreter.analyze(input.query, channel);

      // ========================================
      // STEP 2: Candidate URLs
      // ========================================
      const { discovery } = this.config;

      if (mode === "urls") {
        candidateUrls = userUrls;
        channel.emit("discovery", "info", "Using provided URLs", `${candidateUrls.length} URL(s)`);
      } else {
        candidateUrls = await discoverSources(
          intent.searchQueries,
          intent.companyName,
          { search: this.deps.search },
          {
            maxSources: discovery.maxSources,
            trustedDomains: discovery.trustedDomains,
            excludedDomains: EXCLUDED_DOMAINS,
            fallbackSources: FALLBACK_SOURCES,
            searchQueryLimit: discovery.searchQueryLimit,
            searchResultsPerQuery: discovery.searchResultsPerQuery,
            searchDelayMs: discovery.searchDelayMs,
            searchTimeoutMs: this.config.stageTimeoutMs,
          },
          channel
        );
      }

      // ========================================
      // STEP 3: Load documents
      // ========================================
      const { fetcher } = this.config;
      documents = await loadDocuments(
        candidateUrls,
        { extractor: this.deps.extractor },
        {
          timeoutMs: fetcher.urlLoadTimeoutMs,
          userAgent: fetcher.userAgent,
          fetchDelayMs: fetcher.fetchDelayMs,
          minContentLength: fetcher.minContentLength,
        },
        channel
      );

      // ========================================
      // STEP 4: Score credibility
      // ========================================
      validation = validateDocuments(
        documents,
        {
          trustedDomains: discovery.trustedDomains,
          minConfidenceScore: this.config.scoring.minConfidenceScore,
          highConfidenceThreshold: this.config.scoring.highConfidenceThreshold,
        },
        channel
      );

      // ========================================
      // STEP 5: Synthesize the report
      // ========================================
      report = await this.synthesizer.generateReport(intent, documents, validation, input.query, channel);
    } catch (error) {
      const message = errorMessage(error);
      log.error("Research run failed", error, { runId });
      channel.emit("system", "error", "Research run failed", message);
      report = errorReport(message);
    }

    const durationMs = Date.now() - startTime;
    const events = channel.events();

    const result: PipelineResult = {
      runId,
      query: input.query,
      mode,
      intent,
      candidateUrls,
      documents,
      validation,
      report,
      events,
      durationMs,
    };

    await this.persist(result);
    await this.track(runId, "finish", () => this.record(result));
    await channel.flush();

    channel.metric("run.duration_ms", durationMs, { mode });
    log.info("Research run complete", {
      runId,
      title: report.title,
      confidence: report.confidenceScore,
      documents: documents.length,
      durationMs,
    });

    return result;
  }

  /**
   * Answer a follow-up question from the last saved index
   */
  async ask(question: string): Promise<string> {
    const index = await loadIndex(this.deps.indexStore, INDEX_KEY, this.deps.embedder);
    return this.synthesizer.answerQuestion(question, index);
  }

  getInfo(): { name: string; version: string; agents: string[]; stages: string[] } {
    return {
      name: "equity-research",
      version: "1.0.0",
      agents: [this.interpreter.name, this.synthesizer.name],
      stages: ["interpreter", "discovery", "fetcher", "credibility", "synthesizer"],
    };
  }

  // ============================================
  // RUN ARTIFACTS
  // ============================================

  /**
   * Run summary and Markdown report; failures are logged
   */
  private async persist(result: PipelineResult): Promise<void> {
    const { store } = this.deps;

    try {
      await store.writeJson(`pipelines/${result.runId}`, {
        runId: result.runId,
        query: result.query,
        mode: result.mode,
        intent: result.intent,
        candidateUrls: result.candidateUrls,
        documents: result.documents.map(({ source, contentLength }) => ({ source, contentLength })),
        validation: result.validation,
        report: result.report,
        durationMs: result.durationMs,
      });
      await store.writeText(`reports/${result.runId}.md`, renderReportMarkdown(result.report));
    } catch (error) {
      log.warn("Could not save run artifacts", {
        runId: result.runId,
        error: errorMessage(error),
      });
    }
  }

  /**
   * Bookkeeping never changes a run's outcome; failures are logged
   */
  private async track(runId: string, step: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      log.warn("Could not record run", { runId, step, error: errorMessage(error) });
    }
  }

  /**
   * Run row and lifecycle events (no-ops without Supabase)
   */
  private async record(result: PipelineResult): Promise<void> {
    const { report } = result;

    if (report.title === ERROR_TITLE) {
      const failure = [...result.events].reverse().find((e) => e.status === "error");
      const message = failure?.details ?? "Report generation failed";
      recordRunFailed(result.runId, "SYNTHESIS_ERROR", message);
      await runRepo.fail(result.runId, message, result.durationMs);
      return;
    }

    const status = report.title === NO_DATA_TITLE ? "degraded" : "completed";

    recordRunCompleted(result.runId, {
      status,
      confidence: report.confidenceScore,
      documents: result.documents.length,
    });
    await runRepo.complete(
      result.runId,
      {
        company_name: result.intent.companyName,
        ticker: result.intent.ticker || null,
        candidate_urls: result.candidateUrls,
        documents_loaded: result.documents.length,
        trusted_sources: result.validation.trustedSources,
        confidence_score: report.confidenceScore,
        report: { ...report },
        report_title: report.title,
        duration_ms: result.durationMs,
      },
      status
    );
  }
}

/**
 * Create an equity research system
 */
export function createEquityResearchSystem(
  config: ResearchConfig,
  deps?: Partial<EquityResearchDependencies>
): EquityResearchSystem {
  return new EquityResearchSystem(config, deps);
}
