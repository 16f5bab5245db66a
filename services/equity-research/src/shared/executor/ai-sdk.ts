/**
 * AI SDK Executor
 * Text completion through the Vercel AI SDK (Anthropic or OpenAI)
 */

import { APICallError, generateText, type LanguageModel } from "ai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { CapabilityError, errorMessage, isRetryableError, logger } from "@equisight/core";
import type {
  ICompletionExecutor,
  CompletionRequest,
  CompletionResponse,
} from "./types.js";
import type { LlmProvider } from "../../config.js";
import { sleep } from "../utils/sleep.js";

export interface AiSdkExecutorOptions {
  provider: LlmProvider;
  apiKey?: string;
}

const log = logger.child({ component: "executor" });

/**
 * Provider errors carry their own retry verdict; aborts from the per-attempt timeout are transient
 */
function isTransient(error: unknown): boolean {
  if (APICallError.isInstance(error)) {
    return error.isRetryable;
  }
  if (error instanceof Error && error.name === "TimeoutError") {
    return true;
  }
  return isRetryableError(error);
}

/**
 * Completion executor backed by `generateText`
 */
export class AiSdkExecutor implements ICompletionExecutor {
  private readonly provider: LlmProvider;
  private readonly apiKey?: string;

  constructor(options: AiSdkExecutorOptions) {
    this.provider = options.provider;
    this.apiKey = options.apiKey;
  }

  isReady(): boolean {
    return !!this.apiKey;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const startTime = Date.now();
    const { profile } = request;

    if (!this.isReady()) {
      const error = new CapabilityError(`No API key configured for ${this.provider}`, "completion");
      log.warn(error.message, { ...request.context });
      return {
        success: false,
        output: "",
        durationMs: 0,
        attempts: 0,
        error: { code: error.code, message: error.message },
      };
    }

    const maxAttempts = profile.retries + 1;
    let lastError: unknown;
    let attempt = 0;

    while (attempt < maxAttempts) {
      attempt++;

      try {
        const result = await generateText({
          model: this.model(profile.model),
          system: request.systemPrompt,
          prompt: request.prompt,
          temperature: profile.temperature,
          maxOutputTokens: profile.maxOutputTokens,
          maxRetries: 0,
          abortSignal: AbortSignal.timeout(profile.timeoutMs),
        });

        log.debug("Completion finished", {
          model: profile.model,
          attempt,
          durationMs: Date.now() - startTime,
          ...request.context,
        });

        return {
          success: true,
          output: result.text,
          durationMs: Date.now() - startTime,
          attempts: attempt,
          tokens: {
            input: result.usage.inputTokens ?? 0,
            output: result.usage.outputTokens ?? 0,
          },
        };
      } catch (error) {
        lastError = error;

        if (!isTransient(error) || attempt >= maxAttempts) {
          break;
        }

        // Exponential backoff
        const delay = profile.backoffMs * Math.pow(2, attempt - 1);
        log.warn("Retrying completion", {
          model: profile.model,
          attempt,
          delay,
          error: errorMessage(error),
        });
        await sleep(delay);
      }
    }

    return {
      success: false,
      output: "",
      durationMs: Date.now() - startTime,
      attempts: attempt,
      error: {
        code: "EXECUTOR_ERROR",
        message: errorMessage(lastError),
      },
    };
  }

  private model(modelId: string): LanguageModel {
    if (this.provider === "anthropic") {
      return createAnthropic({ apiKey: this.apiKey })(modelId);
    }
    return createOpenAI({ apiKey: this.apiKey })(modelId);
  }
}

/**
 * Create an AI SDK executor
 */
export function createAiSdkExecutor(options: AiSdkExecutorOptions): ICompletionExecutor {
  return new AiSdkExecutor(options);
}
