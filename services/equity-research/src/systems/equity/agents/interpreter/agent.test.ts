import { describe, it, expect } from "vitest";
import {
  INTERPRETER_PROMPT_VERSION,
  INTERPRETER_SYSTEM_PROMPT,
  getInterpreterPrompt,
} from "../../../../domains/finance/prompts/interpreter.prompt.js";
import { createActivityChannel } from "../../../../shared/observability/channel.js";
import { FakeExecutor } from "../../harness/fakes.js";
import { QueryInterpreter } from "./agent.js";

const query = "Analyze Tesla's Q3 2024 earnings";

function setup(executor: FakeExecutor) {
  const channel = createActivityChannel("run-1", { log: false });
  const interpreter = new QueryInterpreter({ executor }, { model: "test-model" });
  return { channel, interpreter };
}

describe("QueryInterpreter", () => {
  it("should use the model's structured answer", async () => {
    const executor = new FakeExecutor([
      JSON.stringify({
        company_name: "Tesla",
        ticker: "TSLA",
        research_intent: "earnings_analysis",
        key_topics: ["Q3 earnings", "margins"],
        time_frame: "Q3 2024",
        search_queries: ["Tesla Q3 2024 earnings", "TSLA margins"],
      }),
    ]);
    const { channel, interpreter } = setup(executor);

    const intent = await interpreter.analyze(query, channel);

    expect(intent).toEqual({
      companyName: "Tesla",
      ticker: "TSLA",
      researchIntent: "earnings_analysis",
      keyTopics: ["Q3 earnings", "margins"],
      timeFrame: "Q3 2024",
      searchQueries: ["Tesla Q3 2024 earnings", "TSLA margins"],
    });

    const [request] = executor.requests;
    expect(request?.systemPrompt).toBe(INTERPRETER_SYSTEM_PROMPT);
    expect(request?.prompt).toBe(getInterpreterPrompt(query));
    expect(request?.context).toEqual({ stage: "interpreter", promptVersion: INTERPRETER_PROMPT_VERSION });
    expect(request?.profile).toEqual({
      model: "test-model",
      temperature: 0.3,
      maxOutputTokens: 1000,
      timeoutMs: 30_000,
      retries: 1,
      backoffMs: 1000,
    });

    expect(channel.events().map((e) => [e.status, e.action, e.details])).toEqual([
      ["info", "Analyzing research query", query],
      ["success", "Query analysis complete", "Identified: Tesla"],
    ]);
  });

  it("should use the heuristic parser without a model", async () => {
    const executor = new FakeExecutor([], { ready: false });
    const { channel, interpreter } = setup(executor);

    const intent = await interpreter.analyze(query, channel);

    expect(intent.companyName).toBe("Analyze Tesla's");
    expect(executor.requests).toEqual([]);
    expect(channel.events()[1]?.action).toBe("No completion model configured, using heuristic parser");
  });

  it("should fall back when the completion fails", async () => {
    const { channel, interpreter } = setup(new FakeExecutor([{ error: "rate limited" }]));

    const intent = await interpreter.analyze("research Apple", channel);

    expect(intent.companyName).toBe("Apple");
    expect(intent.searchQueries).toEqual(["Apple latest news", "Apple stock analysis", "Apple earnings"]);
    expect(channel.events()[1]).toEqual(
      expect.objectContaining({
        status: "warning",
        action: "Completion failed, using heuristic parser",
        details: "rate limited",
      })
    );
  });

  it("should fall back when the answer is not JSON", async () => {
    const { channel, interpreter } = setup(new FakeExecutor(["Tesla looks strong this quarter."]));

    const intent = await interpreter.analyze("research Apple", channel);

    expect(intent.companyName).toBe("Apple");
    expect(channel.events()[1]?.details).toBe("No JSON object in response");
  });

  it("should generate queries when the model returns none", async () => {
    const { channel, interpreter } = setup(
      new FakeExecutor(['{"company_name": "Microsoft", "search_queries": []}'])
    );

    const intent = await interpreter.analyze("Microsoft cloud growth", channel);

    expect(intent.searchQueries).toEqual([
      "Microsoft latest news",
      "Microsoft stock analysis",
      "Microsoft earnings",
    ]);
  });
});
