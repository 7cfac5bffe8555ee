import type { GridGraph } from "../grid/GridGraph";
import type { MetricsOptions, SearchOptions, SearchResult } from "../interfaces/interfaces";
import { MetricsRecorder } from "../metrics/MetricsRecorder";
import type { Path } from "../types/types";
import { reconstructPath } from "../utils/utils";
import { settle, toPath, wantsMetrics } from "./result";

export function runDFS(graph: GridGraph, rec: MetricsRecorder): Path {
  const start = graph.idOf(graph.start());
  const goal = graph.idOf(graph.goal());
  const stack: number[] = [start];
  const parents = new Map<number, number | null>();
  parents.set(start, null);
  rec.generated();
  rec.observe(1, parents.size);

  let n = stack.pop();
  while (n !== undefined) {
    rec.expanded();
    rec.observe(stack.length, parents.size);

    if (n === goal) return toPath(graph, reconstructPath(parents, goal));

    // pushed in reverse so the first of N,S,E,W is popped first
    const next = [...graph.neighborIds(n)].reverse();
    for (const m of next) {
      if (parents.has(m)) continue;
      parents.set(m, n);
      stack.push(m);
      rec.generated();
      rec.observe(stack.length, parents.size);
    }
    n = stack.pop();
  }
  return [];
}

/** Depth-first search; no optimality guarantee. */
export function dfs(graph: GridGraph): Path;
export function dfs(graph: GridGraph, options: MetricsOptions): SearchResult;
export function dfs(graph: GridGraph, options?: SearchOptions): Path | SearchResult;
export function dfs(graph: GridGraph, options: SearchOptions = {}): Path | SearchResult {
  const rec = new MetricsRecorder();
  rec.start();
  const path = runDFS(graph, rec);
  return wantsMetrics(options) ? settle(graph, path, rec, options) : path;
}
