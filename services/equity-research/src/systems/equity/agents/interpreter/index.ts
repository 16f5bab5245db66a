/**
 * Query Interpreter
 */

export { QueryInterpreter, type InterpreterDependencies, type InterpreterProfile } from "./agent.js";
export {
  ResearchIntentSchema,
  extractJsonSpan,
  parseIntentResponse,
  type RawResearchIntent,
  type ParseOutcome,
} from "./schema.js";
export {
  finalizeIntent,
  heuristicIntent,
  genericQueries,
  companyCandidates,
  INTENT_DEFAULTS,
  MAX_SEARCH_QUERIES,
} from "./heuristics.js";
