/**
 * Fixed reports for the empty and error outcomes
 */

import type { Report } from "../../types.js";

export const NO_DATA_TITLE = "Research Report - No Data Available";
export const ERROR_TITLE = "Research Report - Error";

function terminalReport(
  title: string,
  researchType: string,
  content: string,
  note: string
): Report {
  return {
    title,
    generatedAt: new Date().toISOString(),
    company: "Unknown",
    ticker: "N/A",
    researchType,
    content,
    confidenceScore: 0,
    sources: [],
    validationNotes: [note],
    metadata: {
      totalSources: 0,
      trustedSources: 0,
      analysisDepth: "None",
      sourcesAnalyzed: [],
    },
  };
}

export function emptyReport(): Report {
  return terminalReport(
    NO_DATA_TITLE,
    "Failed",
    `# Unable to Generate Report

No sources could be loaded for analysis. This could be due to:
- Invalid or inaccessible URLs
- Network connectivity issues
- Source websites blocking automated access

Please try:
1. Checking the URLs are correct and accessible
2. Using different sources
3. Reformulating your query
`,
    "No sources available for analysis"
  );
}

export function errorReport(message: string): Report {
  return terminalReport(
    ERROR_TITLE,
    "Error",
    `# Report Generation Error

An error occurred during report generation:

Error: ${message}

Please try again.
`,
    "Report generation failed"
  );
}
