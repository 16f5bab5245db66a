import { describe, it, expect, vi, beforeEach } from "vitest";

const mocks = vi.hoisted(() => {
  interface Result {
    data: unknown;
    error: { message: string } | null;
  }

  const state = {
    configured: true,
    calls: [] as Array<{ table: string; method: string; args: unknown[] }>,
    result: { data: null, error: null } as Result,
  };

  class FakeQuery implements PromiseLike<Result> {
    constructor(private readonly table: string) {}

    private record(method: string, args: unknown[]): this {
      state.calls.push({ table: this.table, method, args });
      return this;
    }

    insert(...args: unknown[]) { return this.record("insert", args); }
    update(...args: unknown[]) { return this.record("update", args); }
    select(...args: unknown[]) { return this.record("select", args); }
    eq(...args: unknown[]) { return this.record("eq", args); }
    single() { return this.record("single", []); }

    then<T1 = Result, T2 = never>(
      onfulfilled?: ((value: Result) => T1 | PromiseLike<T1>) | null,
      onrejected?: ((reason: unknown) => T2 | PromiseLike<T2>) | null
    ): PromiseLike<T1 | T2> {
      return Promise.resolve(state.result).then(onfulfilled, onrejected);
    }
  }

  return { state, FakeQuery };
});

vi.mock("../supabase.js", () => ({
  isSupabaseConfigured: () => mocks.state.configured,
  getSupabase: () => ({ from: (table: string) => new mocks.FakeQuery(table) }),
}));

import { runRepo } from "./run.repository.js";

describe("runRepo", () => {
  beforeEach(() => {
    mocks.state.configured = true;
    mocks.state.calls = [];
    mocks.state.result = { data: null, error: null };
  });

  it("should do nothing without Supabase", async () => {
    mocks.state.configured = false;

    expect(await runRepo.create({ id: "run-1", query: "Tesla", mode: "autonomous" })).toBeNull();
    expect(await runRepo.update("run-1", { status: "completed" })).toBe(false);
    expect(mocks.state.calls).toEqual([]);
  });

  it("should insert new runs as running", async () => {
    mocks.state.result = { data: { id: "run-1" }, error: null };

    const run = await runRepo.create({ id: "run-1", query: "Tesla", mode: "autonomous" });

    expect(run).toEqual({ id: "run-1" });
    const insert = mocks.state.calls.find((c) => c.method === "insert");
    expect(insert?.table).toBe("research_runs");
    expect(insert?.args[0]).toEqual(
      expect.objectContaining({ id: "run-1", query: "Tesla", mode: "autonomous", status: "running" })
    );
  });

  it("should complete runs with the given status", async () => {
    const ok = await runRepo.complete("run-1", { confidence_score: 69.8 }, "degraded");

    expect(ok).toBe(true);
    const update = mocks.state.calls.find((c) => c.method === "update");
    expect(update?.args[0]).toEqual(
      expect.objectContaining({ confidence_score: 69.8, status: "degraded", completed_at: expect.any(String) })
    );
    expect(mocks.state.calls.find((c) => c.method === "eq")?.args).toEqual(["id", "run-1"]);
  });

  it("should record failures with their message", async () => {
    await runRepo.fail("run-2", "model unavailable", 1200);

    const update = mocks.state.calls.find((c) => c.method === "update");
    expect(update?.args[0]).toEqual(
      expect.objectContaining({ status: "failed", error_message: "model unavailable", duration_ms: 1200 })
    );
  });

  it("should report update errors as false", async () => {
    mocks.state.result = { data: null, error: { message: "permission denied" } };

    expect(await runRepo.update("run-3", { status: "completed" })).toBe(false);
  });

});
