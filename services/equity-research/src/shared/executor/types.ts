/**
 * Executor Types
 * Interface for the text-completion layer
 */

// ============================================
// EXECUTOR INTERFACE
// ============================================

/**
 * Completion executor - abstracts LLM calls
 */
export interface ICompletionExecutor {
  /**
   * Run one completion. Failures come back as `success: false`, never thrown.
   */
  complete(request: CompletionRequest): Promise<CompletionResponse>;

  /**
   * Check if executor has credentials
   */
  isReady(): boolean;
}

// ============================================
// PROFILE
// ============================================

/**
 * Per-call model settings
 */
export interface CompletionProfile {
  /** Provider model id */
  model: string;

  /** Sampling temperature */
  temperature: number;

  /** Output length limit */
  maxOutputTokens: number;

  /** Per-attempt timeout */
  timeoutMs: number;

  /** Extra attempts after the first, for retryable failures */
  retries: number;
  backoffMs: number;
}

// ============================================
// REQUEST / RESPONSE
// ============================================

export interface CompletionRequest {
  /** System instructions */
  systemPrompt: string;

  /** User content */
  prompt: string;

  profile: CompletionProfile;

  /** Additional context for logs */
  context?: Record<string, unknown>;
}

export interface CompletionResponse {
  /** Whether the completion succeeded */
  success: boolean;

  /** Model output text */
  output: string;

  /** Wall time across attempts */
  durationMs: number;

  /** Attempts made */
  attempts: number;

  tokens?: {
    input: number;
    output: number;
  };

  error?: {
    code: string;
    message: string;
  };
}
