/**
 * Credibility Scorer & Aggregator
 *
 * Per document (pure, no model call):
 *   50 base, +30 trusted publisher, +10 content > 500 chars,
 *   +10 any finance keyword; clamped to [0, 100]
 *
 * Run level:
 *   overall = round2(0.7 * mean(scores) + 0.3 * 100 * trusted / total)
 */

import type { IActivityChannel, ActivityStatus } from "../../../shared/observability/types.js";
import { FINANCE_KEYWORDS } from "../../../domains/finance/sources.js";
import type { DocumentScore, FetchedDocument, ValidationReport } from "../types.js";
import { isTrustedSource } from "./filter.js";

const STAGE = "credibility";

const BASE_SCORE = 50;
const TRUSTED_BONUS = 30;
const LENGTH_BONUS = 10;
const KEYWORD_BONUS = 10;
const SUBSTANTIAL_LENGTH = 500;

const SCORE_WEIGHT = 0.7;
const TRUST_WEIGHT = 0.3;

export interface ScoringOptions {
  trustedDomains: readonly string[];

  /** Fraction; scores below this × 100 are flagged */
  minConfidenceScore: number;

  /** Fraction; scores at or above this × 100 count as high quality */
  highConfidenceThreshold: number;

  keywords?: readonly string[];
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function scoreDocument(document: FetchedDocument, options: ScoringOptions): DocumentScore {
  const keywords = options.keywords ?? FINANCE_KEYWORDS;
  const isTrusted = isTrustedSource(document.source, options.trustedDomains);

  let score = BASE_SCORE;
  const signals = [`base ${BASE_SCORE}`];

  if (isTrusted) {
    score += TRUSTED_BONUS;
    signals.push(`trusted publisher +${TRUSTED_BONUS}`);
  }

  if ([...document.content].length > SUBSTANTIAL_LENGTH) {
    score += LENGTH_BONUS;
    signals.push(`content over ${SUBSTANTIAL_LENGTH} chars +${LENGTH_BONUS}`);
  }

  const lower = document.content.toLowerCase();
  if (keywords.some((keyword) => lower.includes(keyword.toLowerCase()))) {
    score += KEYWORD_BONUS;
    signals.push(`financial keywords +${KEYWORD_BONUS}`);
  }

  return {
    source: document.source,
    credibilityScore: clamp(Math.round(score), 0, 100),
    reason: signals.join(", "),
    isTrusted,
  };
}

/**
 * Blend mean credibility with the trusted share; 0 for no scores
 */
export function aggregateConfidence(scores: readonly DocumentScore[]): number {
  if (scores.length === 0) return 0;

  const mean = scores.reduce((sum, s) => sum + s.credibilityScore, 0) / scores.length;
  const trusted = scores.filter((s) => s.isTrusted).length;
  const overall = SCORE_WEIGHT * mean + TRUST_WEIGHT * 100 * (trusted / scores.length);

  return clamp(round2(overall), 0, 100);
}

export function validationNotes(
  scores: readonly DocumentScore[],
  options: Pick<ScoringOptions, "minConfidenceScore" | "highConfidenceThreshold">
): string[] {
  const notes: string[] = [];

  const low = scores.filter((s) => s.credibilityScore < options.minConfidenceScore * 100).length;
  if (low > 0) {
    notes.push(`${low} source(s) have low credibility scores`);
  }

  const trusted = scores.filter((s) => s.isTrusted).length;
  if (trusted > 0) {
    notes.push(`${trusted} source(s) from trusted financial sites`);
  }

  const high = scores.filter((s) => s.credibilityScore >= options.highConfidenceThreshold * 100).length;
  if (high > 0) {
    notes.push(`${high} high-quality source(s) found`);
  }

  if (notes.length === 0) {
    notes.push("Moderate quality sources, exercise caution");
  }

  return notes;
}

function scoreStatus(score: number): ActivityStatus {
  if (score >= 70) return "success";
  if (score >= 50) return "warning";
  return "error";
}

export function validateDocuments(
  documents: readonly FetchedDocument[],
  options: ScoringOptions,
  channel?: IActivityChannel
): ValidationReport {
  channel?.emit(STAGE, "info", "Starting validation", `Validating ${documents.length} documents`);

  if (documents.length === 0) {
    return {
      overallConfidence: 0,
      documentScores: [],
      trustedSources: 0,
      totalSources: 0,
      validationNotes: ["No documents to validate"],
    };
  }

  const documentScores = documents.map((document, i) => {
    const score = scoreDocument(document, options);
    channel?.emit(
      STAGE,
      scoreStatus(score.credibilityScore),
      `Document ${i + 1} validated`,
      `Score: ${score.credibilityScore}/100 - ${score.reason}`
    );
    return score;
  });

  const report: ValidationReport = {
    overallConfidence: aggregateConfidence(documentScores),
    documentScores,
    trustedSources: documentScores.filter((s) => s.isTrusted).length,
    totalSources: documentScores.length,
    validationNotes: validationNotes(documentScores, options),
  };

  channel?.emit(
    STAGE,
    "success",
    "Validation complete",
    `Overall confidence: ${report.overallConfidence.toFixed(1)}%`
  );
  channel?.metric("credibility.overall_confidence", report.overallConfidence);

  return report;
}
