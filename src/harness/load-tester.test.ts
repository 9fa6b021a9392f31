import { LoadTester, analyzeLoadResults, planInvocations } from "./load-tester.js";
import type { PipelineRunner } from "./load-tester.js";
import { UpstreamTransportError } from "../errors.js";
import type { ConcurrentQueryResult } from "../types.js";
import { buildStubPipeline } from "../testing/fixtures.js";

const failingPipeline: PipelineRunner = {
  tryExecute: async () => ({
    ok: false,
    error: new UpstreamTransportError("completion", "Completion API error 429: slow down", {
      status: 429,
    }),
  }),
};

describe("planInvocations", () => {
  it("cycles the query list to fill the requested count", () => {
    expect(planInvocations(["a", "b"], 5)).toEqual(["a", "b", "a", "b", "a"]);
  });

  it("truncates when fewer invocations than queries are requested", () => {
    expect(planInvocations(["a", "b", "c"], 2)).toEqual(["a", "b"]);
  });

  it("plans nothing for an empty list or zero users", () => {
    expect(planInvocations([], 10)).toEqual([]);
    expect(planInvocations(["a"], 0)).toEqual([]);
  });
});

describe("LoadTester", () => {
  it("returns exactly one result per concurrent user", async () => {
    const { pipeline } = buildStubPipeline();
    const tester = new LoadTester(pipeline);

    const results = await tester.runConcurrentQueries(["q1", "q2", "q3"], 7);

    expect(results).toHaveLength(7);
    expect(results.map((r) => r.query)).toEqual(["q1", "q2", "q3", "q1", "q2", "q3", "q1"]);
    expect(results.every((r) => r.success)).toBe(true);
  });

  it("passes the configured limit to the pipeline", async () => {
    const { pipeline, search } = buildStubPipeline();
    await new LoadTester(pipeline, { limit: 2 }).runConcurrentQueries(["q"], 1);
    expect(search.calls).toEqual([{ query: "apache country:DE", limit: 2 }]);
  });

  it("records failures with their kind", async () => {
    const tester = new LoadTester(failingPipeline);

    const result = await tester.executeSingleQuery("q");

    expect(result).toMatchObject({
      query: "q",
      success: false,
      error: "Completion API error 429: slow down",
      errorKind: "upstream-transport",
    });
  });

  it("measures elapsed time in seconds with the injected clock", async () => {
    let now = 1_000;
    const clock = () => {
      now += 250;
      return now;
    };
    const tester = new LoadTester(failingPipeline, { clock });

    const result = await tester.executeSingleQuery("q");

    expect(result.totalTime).toBe(0.25);
  });

  it("keeps sibling results when one invocation crashes", async () => {
    let calls = 0;
    const flaky: PipelineRunner = {
      tryExecute: async () => {
        calls += 1;
        if (calls === 2) throw new Error("unexpected");
        return failingPipeline.tryExecute("q");
      },
    };

    const results = await new LoadTester(flaky).runConcurrentQueries(["q"], 3);

    expect(results).toHaveLength(2);
  });
});

describe("analyzeLoadResults", () => {
  const result = (totalTime: number, success: boolean): ConcurrentQueryResult => ({
    query: "q",
    totalTime,
    success,
  });

  it("computes the success rate over all results and times over successes", () => {
    const analysis = analyzeLoadResults([
      result(1, true),
      result(2, true),
      result(3, true),
      result(9, false),
    ]);

    expect(analysis.totalQueries).toBe(4);
    expect(analysis.successfulQueries).toBe(3);
    expect(analysis.failedQueries).toBe(1);
    expect(analysis.successRate).toBe(75);
    expect(analysis.responseTimes.mean).toBe(2);
    expect(analysis.responseTimes.median).toBe(2);
    expect(analysis.responseTimes.stdDev).toBe(1);
    expect(analysis.responseTimes.min).toBe(1);
    expect(analysis.responseTimes.max).toBe(3);
    expect(analysis.responseTimes.p95).toBeCloseTo(2.9);
  });

  it("reports a full success rate", () => {
    expect(analyzeLoadResults([result(1, true), result(1, true)]).successRate).toBe(100);
  });

  it("reports zero statistics when every invocation failed", () => {
    const analysis = analyzeLoadResults([result(4, false), result(5, false)]);
    expect(analysis.successRate).toBe(0);
    expect(analysis.responseTimes).toEqual({ mean: 0, median: 0, stdDev: 0, min: 0, max: 0, p95: 0 });
  });

  it("handles an empty run", () => {
    expect(analyzeLoadResults([]).successRate).toBe(0);
  });
});
