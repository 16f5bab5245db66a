/**
 * Configuration Management
 * Loads and validates base configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

// Base environment schema - shared across all services
export const baseEnvSchema = z.object({
  // LLM providers (both optional: every call site has a fallback)
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),

  // Web search
  SERPER_API_KEY: z.string().optional(),

  // Supabase
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_KEY: z.string().optional(),

  // General
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DATA_DIR: z.string().default("./data"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type BaseEnv = z.infer<typeof baseEnvSchema>;

/**
 * Base configuration - shared across all services
 */
export interface BaseConfig {
  keys: {
    anthropic?: string;
    openai?: string;
    serper?: string;
  };

  supabase?: {
    url: string;
    key: string;
  };

  env: {
    logLevel: "debug" | "info" | "warn" | "error";
    dataDir: string;
    nodeEnv: "development" | "production" | "test";
  };
}

let baseConfigInstance: BaseConfig | null = null;

/**
 * Format zod issues into a readable block
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
    .join("\n");
}

/**
 * Load and validate base configuration
 */
export function loadBaseConfig(source: NodeJS.ProcessEnv = process.env): BaseConfig {
  const parseResult = baseEnvSchema.safeParse(source);

  if (!parseResult.success) {
    throw new ConfigError(`Configuration validation failed:\n${formatIssues(parseResult.error)}`);
  }

  const env = parseResult.data;

  return {
    keys: {
      anthropic: env.ANTHROPIC_API_KEY || undefined,
      openai: env.OPENAI_API_KEY || undefined,
      serper: env.SERPER_API_KEY || undefined,
    },

    supabase: env.SUPABASE_URL && env.SUPABASE_KEY
      ? {
          url: env.SUPABASE_URL,
          key: env.SUPABASE_KEY,
        }
      : undefined,

    env: {
      logLevel: env.LOG_LEVEL,
      dataDir: env.DATA_DIR,
      nodeEnv: env.NODE_ENV,
    },
  };
}

/**
 * Get base configuration (lazy-loaded singleton)
 */
export function getBaseConfig(): BaseConfig {
  if (!baseConfigInstance) {
    baseConfigInstance = loadBaseConfig();
  }
  return baseConfigInstance;
}

/**
 * Reset config (for testing)
 */
export function resetBaseConfig(): void {
  baseConfigInstance = null;
}
