/**
 * @equisight/equity-research
 * Command-line entry point
 *
 * Usage:
 *   tsx src/index.ts research "<query>" [--url <url>]... [-v]
 *   tsx src/index.ts ask "<question>"
 *   tsx src/index.ts help
 */

import "dotenv/config";
import { pathToFileURL } from "node:url";
import { errorMessage, isEquisightError, logger, type LogLevel } from "@equisight/core";
import { flushEvents } from "@equisight/db";
import { getResearchConfig } from "./config.js";
import { createEquityResearchSystem } from "./systems/equity/system.js";
import type { PipelineResult } from "./systems/equity/types.js";
import type { ActivityEvent } from "./shared/observability/types.js";
import { confidenceLevel } from "./systems/equity/utils/markdown.js";

// ============================================
// ARGUMENTS
// ============================================

export interface CliArgs {
  command: "research" | "ask" | "help";
  text: string;
  urls: string[];
  verbose: boolean;
}

/**
 * Parse argv (without the node and script entries)
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const [first, ...rest] = argv;
  const command = first === "research" || first === "ask" ? first : "help";

  const words: string[] = [];
  const urls: string[] = [];
  let verbose = false;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i] ?? "";

    if (arg === "-v" || arg === "--verbose") {
      verbose = true;
    } else if (arg === "--url" || arg === "-u") {
      const value = rest[i + 1];
      if (value !== undefined) {
        urls.push(value);
        i++;
      }
    } else if (arg.startsWith("--url=")) {
      urls.push(arg.slice("--url=".length));
    } else {
      words.push(arg);
    }
  }

  return { command, text: words.join(" ").trim(), urls, verbose };
}

const HELP = `Equisight equity research

Commands:
  research <query> [--url <url>]... [-v]   Run the research pipeline (-v: structured logs)
  ask <question>                           Ask about the last researched sources
  help                                     Show this message

Examples:
  research "Analyze Tesla's Q3 2024 earnings"
  research "Apple outlook" --url https://www.reuters.com/technology/apple
  ask "What did management say about margins?"`;

// ============================================
// OUTPUT
// ============================================

export interface CliOutput {
  level: LogLevel;
  /** Print the compact progress list */
  progress: boolean;
}

/**
 * `-v` forces debug logs. Otherwise LOG_LEVEL applies, and the progress list
 * stands in for stage events whenever that level hides them.
 */
export function cliOutput(verbose: boolean, logLevel: LogLevel): CliOutput {
  const level = verbose ? "debug" : logLevel;
  return { level, progress: level === "warn" || level === "error" };
}

function printEvent(event: ActivityEvent): void {
  const marker = { info: " ", success: "+", warning: "!", error: "x" }[event.status];
  const details = event.details ? ` - ${event.details}` : "";
  console.log(`  [${marker}] ${event.stage}: ${event.action}${details}`);
}

function printResult(result: PipelineResult): void {
  const { report } = result;

  console.log();
  console.log("=".repeat(60));
  console.log(report.title);
  console.log("=".repeat(60));
  console.log("Company:   ", report.company);
  console.log("Ticker:    ", report.ticker);
  console.log(
    "Confidence:",
    `${report.confidenceScore.toFixed(1)}% (${confidenceLevel(report.confidenceScore)})`
  );
  console.log("Sources:   ", report.metadata.totalSources);
  console.log("Depth:     ", report.metadata.analysisDepth);
  console.log();
  console.log(report.content.trim());
  console.log();

  if (report.sources.length > 0) {
    console.log("=".repeat(60));
    console.log("SOURCES");
    console.log("=".repeat(60));
    for (const source of report.sources) {
      const score = source.credibilityScore !== undefined ? ` (${source.credibilityScore}/100)` : "";
      console.log(`${source.index}. ${source.title}${score}`);
      console.log(`   ${source.url}`);
    }
    console.log();
  }

  console.log("=".repeat(60));
  console.log("VALIDATION NOTES");
  console.log("=".repeat(60));
  for (const note of report.validationNotes) {
    console.log(`- ${note}`);
  }
  console.log();
  console.log(`Run ${result.runId} finished in ${(result.durationMs / 1000).toFixed(1)}s`);
}

// ============================================
// MAIN
// ============================================

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.command === "help" || !args.text) {
    console.log(HELP);
    return args.command === "help" ? 0 : 1;
  }

  const config = getResearchConfig();
  const output = cliOutput(args.verbose, config.env.logLevel);
  logger.setLevel(output.level);

  const system = createEquityResearchSystem(config);

  if (args.command === "ask") {
    const answer = await system.ask(args.text);
    console.log(answer);
    return 0;
  }

  console.log("Starting equity research\n");
  console.log("Query:", args.text);
  if (args.urls.length > 0) {
    console.log("URLs: ", args.urls.join(", "));
  }
  console.log();

  const result = await system.run({
    query: args.text,
    urls: args.urls,
    onEvent: output.progress ? printEvent : undefined,
  });

  printResult(result);
  return 0;
}

const entry = process.argv[1];
const isEntryPoint = entry !== undefined && import.meta.url === pathToFileURL(entry).href;

if (isEntryPoint) {
  main()
    .then(async (code) => {
      await flushEvents();
      process.exit(code);
    })
    .catch(async (error: unknown) => {
      console.error("\nFatal:", errorMessage(error));
      if (isEquisightError(error) && error.context) {
        console.error(error.context);
      }
      await flushEvents();
      process.exit(1);
    });
}
