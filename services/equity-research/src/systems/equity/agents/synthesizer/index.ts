/**
 * Report Synthesizer
 */

export {
  ReportSynthesizer,
  NO_SOURCES_ANSWER,
  type SynthesizerDependencies,
  type SynthesizerOptions,
  type SynthesizerProfile,
} from "./agent.js";
export { buildCitations, citationTitle } from "./citations.js";
export { formatContext, analysisDepth, CONTEXT_DELIMITER } from "./context.js";
export { emptyReport, errorReport, NO_DATA_TITLE, ERROR_TITLE } from "./reports.js";
