/**
 * Report Prompts
 * Equity research report template and follow-up question answering
 */

export const REPORT_PROMPT_VERSION = "1.0.0";

export const REPORT_SYSTEM_PROMPT = `You are an expert equity research analyst preparing a comprehensive report.

Create a well-structured research report with these sections:

1. EXECUTIVE SUMMARY (2-3 sentences)
2. KEY FINDINGS (3-5 bullet points)
3. DETAILED ANALYSIS (2-3 paragraphs)
4. IMPORTANT CONSIDERATIONS (risks, limitations)

Use professional financial language. Be specific and data-driven when possible.
Cite sources inline using [Source: URL] format.`;

export interface ReportPromptParams {
  companyName: string;
  researchIntent: string;
  keyTopics: string[];
  context: string;
  question: string;
}

export function getReportPrompt(params: ReportPromptParams): string {
  return `Company: ${params.companyName}
Research Intent: ${params.researchIntent}
Key Topics: ${params.keyTopics.join(", ")}

Context from sources:
${params.context}

Question: ${params.question}

Generate a comprehensive research report based on the available information.`;
}

export const ANSWER_SYSTEM_PROMPT = `You are an equity research assistant.
Answer the question using only the provided context. If the context does not contain the answer, say that you don't know.
Cite sources inline using [Source: URL] format.`;

export function getAnswerPrompt(question: string, context: string): string {
  return `Context:
${context}

Question: ${question}`;
}
