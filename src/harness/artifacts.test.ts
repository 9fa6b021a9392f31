import { mkdtempSync, readFileSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import {
  findLatestArtifact,
  formatRunTimestamp,
  loadLatestEvaluationRun,
  loadLatestLoadRun,
  parseLoadAnalysisJson,
  readLoadResultsCsv,
  saveEvaluationResults,
  saveLoadTestResults,
} from "./artifacts.js";
import { analyzeTimings } from "./evaluator.js";
import { analyzeLoadResults } from "./load-tester.js";
import type { ConcurrentQueryResult, TimingSample } from "../types.js";

const RUN_AT = new Date(2024, 0, 2, 3, 4, 5);

const RESULTS: ConcurrentQueryResult[] = [
  { query: "Find Apache servers, Germany", totalTime: 1.25, success: true },
  { query: "Find nginx", totalTime: 2.5, success: true },
  {
    query: "Find MySQL",
    totalTime: 0.5,
    success: false,
    error: 'Shodan API Error: "quota" exceeded',
    errorKind: "upstream-transport",
  },
];

const SAMPLES: TimingSample[] = [
  { total: 3, translator: 1, search: 1, advisor: 1 },
  { total: 5, translator: 2, search: 1.5, advisor: 1.5 },
];

describe("run artifacts", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "vulnguide-artifacts-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("formats run timestamps in local time", () => {
    expect(formatRunTimestamp(RUN_AT)).toBe("20240102_030405");
  });

  it("writes a load CSV and summary named by run time", () => {
    const analysis = analyzeLoadResults(RESULTS);
    const paths = saveLoadTestResults(dir, RESULTS, analysis, RUN_AT);

    expect(basename(paths.csvPath)).toBe("load_test_results_20240102_030405.csv");
    expect(basename(paths.jsonPath)).toBe("load_test_analysis_20240102_030405.json");

    const csvLines = readFileSync(paths.csvPath, "utf-8").split("\r\n");
    expect(csvLines[0]).toBe("Query,Total Time,Success,Error,Error Kind");
    expect(csvLines[1]).toBe('"Find Apache servers, Germany",1.25,True,,');
    expect(csvLines[3]).toBe('Find MySQL,0.5,False,"Shodan API Error: ""quota"" exceeded",upstream-transport');

    const summary: unknown = JSON.parse(readFileSync(paths.jsonPath, "utf-8"));
    expect(summary).toMatchObject({
      total_queries: 3,
      successful_queries: 2,
      failed_queries: 1,
      response_times: { min: 1.25, max: 2.5 },
    });
  });

  it("reads back the same rows and success split", () => {
    const { csvPath } = saveLoadTestResults(dir, RESULTS, analyzeLoadResults(RESULTS), RUN_AT);

    const rows = readLoadResultsCsv(csvPath);

    expect(rows).toEqual(RESULTS);
    expect(rows.filter((r) => r.success)).toHaveLength(2);
  });

  it("loads the latest saved load run", async () => {
    const analysis = analyzeLoadResults(RESULTS);
    saveLoadTestResults(dir, RESULTS, analysis, RUN_AT);

    const run = await loadLatestLoadRun(dir);

    expect(run?.results).toHaveLength(3);
    expect(run?.analysis).toEqual(analysis);
  });

  it("loads the latest saved evaluation run", async () => {
    const analysis = analyzeTimings(SAMPLES);
    const paths = saveEvaluationResults(dir, SAMPLES, analysis, RUN_AT);

    expect(basename(paths.csvPath)).toBe("timing_results_20240102_030405.csv");
    expect(basename(paths.jsonPath)).toBe("analysis_20240102_030405.json");

    const run = await loadLatestEvaluationRun(dir);
    expect(run?.samples).toEqual(SAMPLES);
    expect(run?.analysis).toEqual(analysis);
  });

  it("returns undefined when no run has been saved", async () => {
    expect(await loadLatestLoadRun(dir)).toBeUndefined();
    expect(await loadLatestEvaluationRun(dir)).toBeUndefined();
  });

  it("picks the most recently modified match", async () => {
    const older = join(dir, "timing_results_20240101_000000.csv");
    const newer = join(dir, "timing_results_20230101_000000.csv");
    writeFileSync(older, "");
    writeFileSync(newer, "");
    utimesSync(older, new Date(2024, 0, 1), new Date(2024, 0, 1));
    utimesSync(newer, new Date(2024, 5, 1), new Date(2024, 5, 1));
    writeFileSync(join(dir, "notes.csv"), "");

    expect(await findLatestArtifact(dir, "timing_results_*.csv")).toBe(newer);
  });

  it("rejects a summary missing a field", () => {
    expect(() => parseLoadAnalysisJson({ total_queries: 1 }, "summary.json")).toThrow(
      'summary.json: "response_times" must be an object',
    );
  });
});
