/**
 * Research Intent Schema
 * Zod schema for the interpreter's JSON contract
 */

import { z } from "zod";

// Every field may be missing or null; present fields must have the right type
export const ResearchIntentSchema = z.object({
  company_name: z.string().nullish(),
  ticker: z.string().nullish(),
  research_intent: z.string().nullish(),
  key_topics: z.array(z.string()).nullish(),
  time_frame: z.string().nullish(),
  search_queries: z.array(z.string()).nullish(),
});

export type RawResearchIntent = z.infer<typeof ResearchIntentSchema>;

export type ParseOutcome =
  | { ok: true; value: RawResearchIntent }
  | { ok: false; reason: string };

/**
 * First balanced `{...}` span, skipping braces inside string literals
 */
export function extractJsonSpan(text: string): string | null {
  const start = text.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === "\"") {
        inString = false;
      }
      continue;
    }

    if (ch === "\"") {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return null;
}

/**
 * Parse a completion into the raw intent record. Anything short of a clean
 * parse is a failure; there is no partial acceptance.
 */
export function parseIntentResponse(text: string): ParseOutcome {
  const span = extractJsonSpan(text);
  if (span === null) {
    return { ok: false, reason: "No JSON object in response" };
  }

  let json: unknown;
  try {
    json = JSON.parse(span);
  } catch (error) {
    return {
      ok: false,
      reason: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const result = ResearchIntentSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    return {
      ok: false,
      reason: `Schema mismatch at ${issue?.path.join(".") || "root"}: ${issue?.message ?? "invalid"}`,
    };
  }

  return { ok: true, value: result.data };
}
