import type { GridGraph } from "../grid/GridGraph";
import type { MetricsOptions, SearchOptions, SearchResult } from "../interfaces/interfaces";
import { MetricsRecorder } from "../metrics/MetricsRecorder";
import type { Heuristic, Path } from "../types/types";
import { manhattan } from "../utils/heuristic/buildHeuristic";
import { GREEDY_POLICY, bestFirstSearch } from "./bestFirst";
import { settle, wantsMetrics } from "./result";

// Ordered by h alone; fast, not optimal
export function greedy(graph: GridGraph, heuristic?: Heuristic): Path;
export function greedy(
  graph: GridGraph,
  heuristic: Heuristic | undefined,
  options: MetricsOptions
): SearchResult;
export function greedy(
  graph: GridGraph,
  heuristic?: Heuristic,
  options?: SearchOptions
): Path | SearchResult;
export function greedy(
  graph: GridGraph,
  heuristic: Heuristic = manhattan,
  options: SearchOptions = {}
): Path | SearchResult {
  const rec = new MetricsRecorder();
  rec.start();
  const path = bestFirstSearch(graph, heuristic, GREEDY_POLICY, rec);
  return wantsMetrics(options) ? settle(graph, path, rec, options) : path;
}
