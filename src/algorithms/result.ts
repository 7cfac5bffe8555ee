import type { GridGraph } from "../grid/GridGraph";
import type { SearchOptions, SearchResult } from "../interfaces/interfaces";
import type { MetricsRecorder } from "../metrics/MetricsRecorder";
import { withVerdict } from "../metrics/oracle";
import type { Path } from "../types/types";

export const wantsMetrics = (options: SearchOptions) =>
  options.withMetrics === true || options.computeOptimality === true;

// Close the recorder and, when asked, attach the oracle's verdict
export function settle(
  graph: GridGraph,
  path: Path,
  recorder: MetricsRecorder,
  options: SearchOptions
): SearchResult {
  const metrics = recorder.finish(graph, path);
  return {
    path,
    metrics: options.computeOptimality ? withVerdict(graph, path, metrics) : metrics,
  };
}

export const toPath = (graph: GridGraph, ids: number[]): Path =>
  ids.map((id) => graph.posOf(id));
