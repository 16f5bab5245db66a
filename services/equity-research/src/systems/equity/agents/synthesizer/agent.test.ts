import { describe, it, expect } from "vitest";
import {
  ANSWER_SYSTEM_PROMPT,
  REPORT_PROMPT_VERSION,
  REPORT_SYSTEM_PROMPT,
  getAnswerPrompt,
  getReportPrompt,
} from "../../../../domains/finance/prompts/report.prompt.js";
import { createActivityChannel } from "../../../../shared/observability/channel.js";
import { FakeEmbedder, FakeExecutor, MemoryStore } from "../../harness/fakes.js";
import type { FetchedDocument, ResearchIntent, ValidationReport } from "../../types.js";
import { NO_SOURCES_ANSWER, ReportSynthesizer, type SynthesizerOptions } from "./agent.js";
import { formatContext } from "./context.js";
import { ERROR_TITLE, NO_DATA_TITLE } from "./reports.js";

const REUTERS = "https://www.reuters.com/tesla";
const BLOG = "https://blog.example.com/tesla";

const options: SynthesizerOptions = {
  chunkSize: 1000,
  chunkOverlap: 200,
  topK: 5,
  answerTopK: 3,
  contextCharsPerChunk: 400,
  indexKey: "index",
};

const intent: ResearchIntent = {
  companyName: "Tesla",
  ticker: "TSLA",
  researchIntent: "earnings_analysis",
  keyTopics: ["margins", "deliveries"],
  timeFrame: "recent",
  searchQueries: ["Tesla earnings"],
};

function doc(source: string, content: string): FetchedDocument {
  return { source, content, contentLength: content.length };
}

const documents = [
  doc(REUTERS, "Tesla revenue rose in the quarter."),
  doc(BLOG, "Tesla margin pressure continued."),
];

const validation: ValidationReport = {
  overallConfidence: 67.5,
  documentScores: [
    { source: REUTERS, credibilityScore: 90, reason: "", isTrusted: true },
    { source: BLOG, credibilityScore: 60, reason: "", isTrusted: false },
  ],
  trustedSources: 1,
  totalSources: 2,
  validationNotes: ["1 source(s) from trusted financial sites"],
};

const question = "How did Tesla do last quarter?";

describe("ReportSynthesizer", () => {
  describe("generateReport", () => {
    it("should build a cited report from the completion", async () => {
      const executor = new FakeExecutor(["## Executive Summary\nTesla grew revenue."]);
      const store = new MemoryStore();
      const synthesizer = new ReportSynthesizer({ executor, embedder: null, store }, options, {
        model: "test-model",
      });
      const channel = createActivityChannel("run-1", { log: false });

      const report = await synthesizer.generateReport(intent, documents, validation, question, channel);

      expect(report).toEqual({
        title: "Equity Research Report: Tesla",
        generatedAt: expect.any(String),
        company: "Tesla",
        ticker: "TSLA",
        researchType: "earnings_analysis",
        content: "## Executive Summary\nTesla grew revenue.",
        confidenceScore: 67.5,
        sources: [
          { url: REUTERS, title: "Source from www.reuters.com", index: 1, credibilityScore: 90, isTrusted: true },
          { url: BLOG, title: "Source from blog.example.com", index: 2, credibilityScore: 60, isTrusted: false },
        ],
        validationNotes: ["1 source(s) from trusted financial sites"],
        metadata: {
          totalSources: 2,
          trustedSources: 1,
          analysisDepth: "Surface",
          sourcesAnalyzed: [REUTERS, BLOG],
        },
      });

      const context = formatContext(
        documents.map((d) => ({ source: d.source, content: d.content, position: 0 })),
        400
      );
      expect(executor.requests[0]?.systemPrompt).toBe(REPORT_SYSTEM_PROMPT);
      expect(executor.requests[0]?.prompt).toBe(
        getReportPrompt({
          companyName: "Tesla",
          researchIntent: "earnings_analysis",
          keyTopics: ["margins", "deliveries"],
          context,
          question,
        })
      );
      expect(executor.requests[0]?.profile.temperature).toBe(0.4);
      expect(executor.requests[0]?.context).toEqual({
        stage: "synthesizer",
        promptVersion: REPORT_PROMPT_VERSION,
      });

      expect(store.files.has("index.json")).toBe(true);
      expect(channel.events().map((e) => [e.status, e.action, e.details])).toEqual([
        ["info", "Generating report", "Processing 2 documents"],
        ["success", "Report generated successfully", "Confidence: 67.5% | Sources: 2"],
      ]);
    });

    it("should default a missing ticker to N/A", async () => {
      const synthesizer = new ReportSynthesizer(
        { executor: new FakeExecutor(["Report body"]), embedder: null },
        options,
        { model: "test-model" }
      );
      const channel = createActivityChannel("run-1", { log: false });

      const report = await synthesizer.generateReport({ ...intent, ticker: "" }, documents, validation, question, channel);

      expect(report.ticker).toBe("N/A");
    });

    it("should return the no-data report without documents", async () => {
      const executor = new FakeExecutor(["unused"]);
      const synthesizer = new ReportSynthesizer({ executor, embedder: null }, options, { model: "test-model" });
      const channel = createActivityChannel("run-1", { log: false });

      const report = await synthesizer.generateReport(intent, [], validation, question, channel);

      expect(report.title).toBe(NO_DATA_TITLE);
      expect(report.confidenceScore).toBe(0);
      expect(executor.requests).toEqual([]);
      expect(channel.events()[1]).toEqual(
        expect.objectContaining({
          status: "warning",
          action: "No documents available, returning empty report",
        })
      );
    });

    it("should return the error report when the completion fails", async () => {
      const synthesizer = new ReportSynthesizer(
        { executor: new FakeExecutor([{ error: "quota exceeded" }]), embedder: null },
        options,
        { model: "test-model" }
      );
      const channel = createActivityChannel("run-1", { log: false });

      const report = await synthesizer.generateReport(intent, documents, validation, question, channel);

      expect(report.title).toBe(ERROR_TITLE);
      expect(report.content.split("\n")).toContain("Error: quota exceeded");
      expect(channel.events().at(-1)).toEqual(
        expect.objectContaining({
          status: "error",
          action: "Report generation failed",
          details: "quota exceeded",
        })
      );
    });

    it("should cite a repeated source once but count every document", async () => {
      const synthesizer = new ReportSynthesizer(
        { executor: new FakeExecutor(["Report body"]), embedder: null },
        options,
        { model: "test-model" }
      );
      const channel = createActivityChannel("run-1", { log: false });
      const repeated = [doc(REUTERS, "First page."), doc(REUTERS, "Second page.")];

      const report = await synthesizer.generateReport(intent, repeated, validation, question, channel);

      expect(report.sources.map((s) => s.url)).toEqual([REUTERS]);
      expect(report.metadata.totalSources).toBe(2);
    });

    it("should put the most similar chunks into the context", async () => {
      const executor = new FakeExecutor(["Report body"]);
      const synthesizer = new ReportSynthesizer(
        { executor, embedder: new FakeEmbedder() },
        { ...options, topK: 1 },
        { model: "test-model" }
      );
      const channel = createActivityChannel("run-1", { log: false });
      const mixed = [doc(BLOG, "football goal"), doc(REUTERS, "revenue revenue")];

      await synthesizer.generateReport(intent, mixed, validation, "revenue", channel);

      expect(executor.requests[0]?.prompt).toBe(
        getReportPrompt({
          companyName: "Tesla",
          researchIntent: "earnings_analysis",
          keyTopics: ["margins", "deliveries"],
          context: `[Source 1: ${REUTERS}]\nrevenue revenue\n`,
          question: "revenue",
        })
      );
    });
  });

  describe("answerQuestion", () => {
    it("should refuse without an index", async () => {
      const executor = new FakeExecutor(["unused"]);
      const synthesizer = new ReportSynthesizer({ executor, embedder: null }, options, { model: "test-model" });

      expect(await synthesizer.answerQuestion(question, null)).toBe(NO_SOURCES_ANSWER);
      expect(await synthesizer.answerQuestion(question, await synthesizer.buildIndex([]))).toBe(
        NO_SOURCES_ANSWER
      );
      expect(executor.requests).toEqual([]);
    });

    it("should answer from the indexed chunks", async () => {
      const executor = new FakeExecutor(["  Margins narrowed.  "]);
      const synthesizer = new ReportSynthesizer({ executor, embedder: null }, options, { model: "test-model" });
      const index = await synthesizer.buildIndex(documents);

      const answer = await synthesizer.answerQuestion("What happened to margins?", index);

      expect(answer).toBe("Margins narrowed.");
      expect(executor.requests[0]?.systemPrompt).toBe(ANSWER_SYSTEM_PROMPT);
      expect(executor.requests[0]?.prompt).toBe(
        getAnswerPrompt(
          "What happened to margins?",
          `[Source: ${REUTERS}]\nTesla revenue rose in the quarter.\n\n[Source: ${BLOG}]\nTesla margin pressure continued.`
        )
      );
    });

    it("should report an empty answer", async () => {
      const synthesizer = new ReportSynthesizer(
        { executor: new FakeExecutor(["   "]), embedder: null },
        options,
        { model: "test-model" }
      );

      const answer = await synthesizer.answerQuestion(question, await synthesizer.buildIndex(documents));

      expect(answer).toBe("Unable to generate answer.");
    });

    it("should return the failure as text", async () => {
      const synthesizer = new ReportSynthesizer(
        { executor: new FakeExecutor([{ error: "timeout" }]), embedder: null },
        options,
        { model: "test-model" }
      );

      const answer = await synthesizer.answerQuestion(question, await synthesizer.buildIndex(documents));

      expect(answer).toBe("Error answering question: timeout");
    });
  });
});
