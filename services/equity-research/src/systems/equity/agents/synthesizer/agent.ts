/**
 * Report Synthesizer Agent
 * Retrieval-grounded report generation with deduplicated citations
 *
 * - no documents → fixed "No Data Available" report, no model or index calls
 * - otherwise → index chunks, retrieve top-k, bounded context, completion
 * - any failure → fixed "Error" report
 */

import { SynthesisError, errorMessage, logger } from "@equisight/core";
import type { CompletionProfile, ICompletionExecutor } from "../../../../shared/executor/types.js";
import type { IActivityChannel } from "../../../../shared/observability/types.js";
import type { IStore } from "../../../../shared/store/types.js";
import type { IEmbedder, IRetrievalIndex } from "../../../../shared/retrieval/types.js";
import { VectorIndex, saveIndex } from "../../../../shared/retrieval/vector-index.js";
import {
  ANSWER_SYSTEM_PROMPT,
  REPORT_PROMPT_VERSION,
  REPORT_SYSTEM_PROMPT,
  getAnswerPrompt,
  getReportPrompt,
} from "../../../../domains/finance/prompts/report.prompt.js";
import type {
  FetchedDocument,
  Report,
  ResearchIntent,
  ValidationReport,
} from "../../types.js";
import { buildCitations } from "./citations.js";
import { analysisDepth, formatContext } from "./context.js";
import { emptyReport, errorReport } from "./reports.js";

// ============================================
// AGENT CONFIGURATION
// ============================================

const SYNTHESIZER_PROFILE: Omit<CompletionProfile, "model"> = {
  temperature: 0.4,
  maxOutputTokens: 1000,
  timeoutMs: 30_000,
  retries: 1,
  backoffMs: 1000,
};

const STAGE = "synthesizer";

export const NO_SOURCES_ANSWER = "No sources available to answer this question.";

export interface SynthesizerDependencies {
  executor: ICompletionExecutor;

  /** Null keeps retrieval in document order */
  embedder: IEmbedder | null;

  /** Where index snapshots go; omit to skip snapshots */
  store?: IStore;
}

export interface SynthesizerOptions {
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  answerTopK: number;
  contextCharsPerChunk: number;

  /** Store key for the index snapshot */
  indexKey?: string;
}

export type SynthesizerProfile = Pick<CompletionProfile, "model"> & Partial<CompletionProfile>;

const log = logger.child({ component: STAGE });

// ============================================
// SYNTHESIZER AGENT
// ============================================

export class ReportSynthesizer {
  readonly name = "synthesizer";
  readonly version = "1.0.0";

  private readonly deps: SynthesizerDependencies;
  private readonly options: SynthesizerOptions;
  private readonly profile: CompletionProfile;

  constructor(
    deps: SynthesizerDependencies,
    options: SynthesizerOptions,
    profile: SynthesizerProfile
  ) {
    this.deps = deps;
    this.options = options;
    this.profile = { ...SYNTHESIZER_PROFILE, ...profile };
  }

  /**
   * Never throws
   */
  async generateReport(
    intent: ResearchIntent,
    documents: readonly FetchedDocument[],
    validation: ValidationReport,
    question: string,
    channel: IActivityChannel
  ): Promise<Report> {
    channel.emit(STAGE, "info", "Generating report", `Processing ${documents.length} documents`);

    if (documents.length === 0) {
      channel.emit(STAGE, "warning", "No documents available, returning empty report");
      return emptyReport();
    }

    try {
      const index = await this.buildIndex(documents);
      await this.persistIndex(index, channel);

      const chunks = await index.nearest(question, this.options.topK);
      const context = formatContext(chunks, this.options.contextCharsPerChunk);

      const response = await this.deps.executor.complete({
        systemPrompt: REPORT_SYSTEM_PROMPT,
        prompt: getReportPrompt({
          companyName: intent.companyName,
          researchIntent: intent.researchIntent,
          keyTopics: intent.keyTopics,
          context,
          question,
        }),
        profile: this.profile,
        context: { stage: STAGE, promptVersion: REPORT_PROMPT_VERSION },
      });

      if (!response.success) {
        throw new SynthesisError(response.error?.message ?? "Completion failed");
      }

      const sources = buildCitations(documents, validation.documentScores);

      const report: Report = {
        title: `Equity Research Report: ${intent.companyName}`,
        generatedAt: new Date().toISOString(),
        company: intent.companyName,
        ticker: intent.ticker || "N/A",
        researchType: intent.researchIntent,
        content: response.output,
        confidenceScore: validation.overallConfidence,
        sources,
        validationNotes: [...validation.validationNotes],
        metadata: {
          totalSources: documents.length,
          trustedSources: validation.trustedSources,
          analysisDepth: analysisDepth(documents),
          sourcesAnalyzed: documents.map((d) => d.source),
        },
      };

      channel.emit(
        STAGE,
        "success",
        "Report generated successfully",
        `Confidence: ${report.confidenceScore.toFixed(1)}% | Sources: ${sources.length}`
      );

      return report;
    } catch (error) {
      const message = errorMessage(error);
      channel.emit(STAGE, "error", "Report generation failed", message);
      return errorReport(message);
    }
  }

  /**
   * Answer a follow-up question from the top chunks of an index. Never throws.
   */
  async answerQuestion(
    question: string,
    index: IRetrievalIndex | null,
    channel?: IActivityChannel
  ): Promise<string> {
    if (!index || index.size === 0) {
      return NO_SOURCES_ANSWER;
    }

    try {
      const chunks = await index.nearest(question, this.options.answerTopK);
      if (chunks.length === 0) {
        return NO_SOURCES_ANSWER;
      }

      const context = chunks
        .map((chunk) => `[Source: ${chunk.source}]\n${chunk.content}`)
        .join("\n\n");

      const response = await this.deps.executor.complete({
        systemPrompt: ANSWER_SYSTEM_PROMPT,
        prompt: getAnswerPrompt(question, context),
        profile: this.profile,
        context: { stage: "answer", promptVersion: REPORT_PROMPT_VERSION },
      });

      if (!response.success) {
        throw new SynthesisError(response.error?.message ?? "Completion failed");
      }

      return response.output.trim() || "Unable to generate answer.";
    } catch (error) {
      const message = errorMessage(error);
      channel?.emit(STAGE, "error", "Question answering failed", message);
      log.error("Question answering failed", error);
      return `Error answering question: ${message}`;
    }
  }

  /**
   * Index over the given documents, chunked with the configured size and overlap
   */
  buildIndex(documents: readonly FetchedDocument[]): Promise<VectorIndex> {
    return VectorIndex.build(
      documents,
      { chunkSize: this.options.chunkSize, chunkOverlap: this.options.chunkOverlap },
      this.deps.embedder
    );
  }

  private async persistIndex(index: VectorIndex, channel: IActivityChannel): Promise<void> {
    const { store } = this.deps;
    const key = this.options.indexKey;
    if (!store || !key) return;

    try {
      await saveIndex(store, key, index);
    } catch (error) {
      channel.emit(STAGE, "warning", "Could not save index snapshot", errorMessage(error));
    }
  }
}
