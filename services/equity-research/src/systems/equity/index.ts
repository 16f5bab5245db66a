/**
 * Equity Research System Exports
 */

// System
export * from "./types.js";
export * from "./system.js";

// Agents
export * from "./agents/interpreter/index.js";
export * from "./agents/synthesizer/index.js";

// Stages
export { discoverSources, buildSearchQueries, normalizeUserUrls } from "./stages/discovery.js";
export { loadDocuments } from "./stages/fetcher.js";
export { prioritizeUrls, isTrustedSource, isExcludedUrl, matchesDomainEntry } from "./stages/filter.js";
export {
  validateDocuments,
  scoreDocument,
  aggregateConfidence,
  validationNotes,
} from "./stages/credibility.js";

// Rendering
export { renderReportMarkdown, confidenceLevel, sourceQuality } from "./utils/markdown.js";

// Configuration
export {
  loadResearchConfig,
  getResearchConfig,
  resetResearchConfig,
  type ResearchConfig,
} from "../../config.js";
