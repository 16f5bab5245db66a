/**
 * Markdown rendering for finished reports
 */

import type { Report, SourceCitation } from "../types.js";

export type ConfidenceLevel = "High" | "Medium" | "Low";

/**
 * Report-level band: High ≥ 75, Medium ≥ 50
 */
export function confidenceLevel(score: number): ConfidenceLevel {
  if (score >= 75) return "High";
  if (score >= 50) return "Medium";
  return "Low";
}

/**
 * Per-source band: High ≥ 80, Medium ≥ 60
 */
export function sourceQuality(score: number): ConfidenceLevel {
  if (score >= 80) return "High";
  if (score >= 60) return "Medium";
  return "Low";
}

function renderCitation(citation: SourceCitation): string {
  const line = `${citation.index}. [${citation.title}](${citation.url})`;
  if (citation.credibilityScore === undefined) return line;

  const badge = `${sourceQuality(citation.credibilityScore)} Quality (${citation.credibilityScore}/100)`;
  return citation.isTrusted ? `${line} - ${badge}, trusted source` : `${line} - ${badge}`;
}

export function renderReportMarkdown(report: Report): string {
  const lines: string[] = [
    `# ${report.title}`,
    "",
    `- Generated: ${report.generatedAt}`,
    `- Company: ${report.company}`,
    `- Ticker: ${report.ticker}`,
    `- Research type: ${report.researchType}`,
    `- Confidence: ${report.confidenceScore.toFixed(1)}% (${confidenceLevel(report.confidenceScore)})`,
    `- Sources: ${report.metadata.totalSources} (${report.metadata.trustedSources} trusted)`,
    `- Analysis depth: ${report.metadata.analysisDepth}`,
    "",
    "## Report",
    "",
    report.content.trim(),
    "",
    "## Sources",
    "",
  ];

  if (report.sources.length > 0) {
    lines.push(...report.sources.map(renderCitation));
  } else if (report.metadata.sourcesAnalyzed.length > 0) {
    lines.push(...report.metadata.sourcesAnalyzed.map((url, i) => `${i + 1}. ${url}`));
  } else {
    lines.push("No source information available.");
  }

  if (report.validationNotes.length > 0) {
    lines.push("", "## Validation Notes", "", ...report.validationNotes.map((note) => `- ${note}`));
  }

  return `${lines.join("\n")}\n`;
}
