import { isInformed, runAlgorithm } from "../algorithms";
import type { GenerateConfig, RunnerConfig } from "../config/config";
import type { GridGraph } from "../grid/GridGraph";
import type { ReportRow } from "../interfaces/interfaces";
import { labelsSequence } from "../report/renderPath";
import type { HeuristicType } from "../types/types";
import { buildHeuristic } from "../utils/heuristic/buildHeuristic";
import { generateMaze } from "../utils/mapGen/mapGen";

export type SuiteConfig = Pick<RunnerConfig, "algorithms" | "heuristics" | "computeOptimality">;

export interface TrialResult {
  trial: number;
  seed: number;
  graph: GridGraph;
  rows: ReportRow[];
}

// Informed searches run once per heuristic, uninformed ones once
export function runSuite(graph: GridGraph, config: SuiteConfig): ReportRow[] {
  const rows: ReportRow[] = [];
  for (const algo of config.algorithms) {
    const variants: (HeuristicType | null)[] = isInformed(algo) ? config.heuristics : [null];
    for (const h of variants) {
      const { path, metrics } = runAlgorithm(
        algo,
        graph,
        h === null ? undefined : buildHeuristic(h),
        { computeOptimality: config.computeOptimality }
      );
      rows.push({
        algo,
        heuristic: h ?? "-",
        path,
        pathLabels: labelsSequence(graph, path),
        metrics,
      });
    }
  }
  return rows;
}

export function runTrials(gen: GenerateConfig, config: SuiteConfig): TrialResult[] {
  const results: TrialResult[] = [];
  for (let trial = 0; trial < gen.trials; trial++) {
    const seed = gen.seed + trial;
    const graph = generateMaze({
      rows: gen.rows,
      cols: gen.cols,
      seed,
      loopRate: gen.loopRate,
      oneWayRate: gen.oneWayRate,
    });
    results.push({ trial, seed, graph, rows: runSuite(graph, config) });
  }
  return results;
}
