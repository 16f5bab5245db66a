/**
 * Query Interpreter Agent
 * Turns a free-text research question into a ResearchIntent
 *
 * Two paths, decided strictly:
 * - completion → first balanced JSON span → schema → accepted as-is
 * - anything else → heuristic parse of the raw query
 * Field defaults are applied after either path.
 */

import { errorMessage } from "@equisight/core";
import type { CompletionProfile, ICompletionExecutor } from "../../../../shared/executor/types.js";
import type { IActivityChannel } from "../../../../shared/observability/types.js";
import {
  INTERPRETER_PROMPT_VERSION,
  INTERPRETER_SYSTEM_PROMPT,
  getInterpreterPrompt,
} from "../../../../domains/finance/prompts/interpreter.prompt.js";
import type { ResearchIntent } from "../../types.js";
import { parseIntentResponse, type RawResearchIntent } from "./schema.js";
import { finalizeIntent, heuristicIntent } from "./heuristics.js";

// ============================================
// AGENT CONFIGURATION
// ============================================

const INTERPRETER_PROFILE: Omit<CompletionProfile, "model"> = {
  temperature: 0.3,
  maxOutputTokens: 1000,
  timeoutMs: 30_000,
  retries: 1,
  backoffMs: 1000,
};

const STAGE = "interpreter";

export interface InterpreterDependencies {
  executor: ICompletionExecutor;
}

export type InterpreterProfile = Pick<CompletionProfile, "model"> & Partial<CompletionProfile>;

// ============================================
// INTERPRETER AGENT
// ============================================

export class QueryInterpreter {
  readonly name = "interpreter";
  readonly version = "1.0.0";

  private readonly deps: InterpreterDependencies;
  private readonly profile: CompletionProfile;

  constructor(deps: InterpreterDependencies, profile: InterpreterProfile) {
    this.deps = deps;
    this.profile = { ...INTERPRETER_PROFILE, ...profile };
  }

  /**
   * Never throws; always returns a fully populated intent
   */
  async analyze(query: string, channel: IActivityChannel): Promise<ResearchIntent> {
    channel.emit(STAGE, "info", "Analyzing research query", query.slice(0, 100));

    let raw: RawResearchIntent;
    try {
      raw = await this.interpret(query, channel);
    } catch (error) {
      channel.emit(STAGE, "warning", "Analysis failed, using fallback", errorMessage(error));
      raw = heuristicIntent(query);
    }

    const intent = finalizeIntent(raw);

    channel.emit(
      STAGE,
      "success",
      "Query analysis complete",
      `Identified: ${intent.companyName}`
    );

    return intent;
  }

  private async interpret(query: string, channel: IActivityChannel): Promise<RawResearchIntent> {
    if (!this.deps.executor.isReady()) {
      channel.emit(STAGE, "warning", "No completion model configured, using heuristic parser");
      return heuristicIntent(query);
    }

    const response = await this.deps.executor.complete({
      systemPrompt: INTERPRETER_SYSTEM_PROMPT,
      prompt: getInterpreterPrompt(query),
      profile: this.profile,
      context: { stage: STAGE, promptVersion: INTERPRETER_PROMPT_VERSION },
    });

    if (!response.success) {
      channel.emit(
        STAGE,
        "warning",
        "Completion failed, using heuristic parser",
        response.error?.message
      );
      return heuristicIntent(query);
    }

    const parsed = parseIntentResponse(response.output);
    if (!parsed.ok) {
      channel.emit(STAGE, "warning", "Unparseable completion, using heuristic parser", parsed.reason);
      return heuristicIntent(query);
    }

    return parsed.value;
  }
}
