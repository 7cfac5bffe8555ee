import type { GridGraph } from "../grid/GridGraph";
import type { MetricsOptions, SearchOptions, SearchResult } from "../interfaces/interfaces";
import { MetricsRecorder } from "../metrics/MetricsRecorder";
import type { Path } from "../types/types";
import { reconstructPath } from "../utils/utils";
import { settle, toPath, wantsMetrics } from "./result";

/**
 * Breadth-first search. Nodes are marked visited when queued, so the first
 * time the goal is dequeued its parent chain is a minimum-edge path.
 */
export function runBFS(graph: GridGraph, rec: MetricsRecorder): Path {
  const start = graph.idOf(graph.start());
  const goal = graph.idOf(graph.goal());
  const openQ: number[] = [start];
  let head = 0;
  const parents = new Map<number, number | null>();
  parents.set(start, null);
  rec.generated();
  rec.observe(1, parents.size);

  while (head < openQ.length) {
    const n = openQ[head++];
    rec.expanded();
    rec.observe(openQ.length - head, parents.size);

    if (n === goal) return toPath(graph, reconstructPath(parents, goal));

    for (const m of graph.neighborIds(n)) {
      if (parents.has(m)) continue;
      parents.set(m, n);
      openQ.push(m);
      rec.generated();
      rec.observe(openQ.length - head, parents.size);
    }
  }
  return [];
}

export function bfs(graph: GridGraph): Path;
export function bfs(graph: GridGraph, options: MetricsOptions): SearchResult;
export function bfs(graph: GridGraph, options?: SearchOptions): Path | SearchResult;
export function bfs(graph: GridGraph, options: SearchOptions = {}): Path | SearchResult {
  const rec = new MetricsRecorder();
  rec.start();
  const path = runBFS(graph, rec);
  return wantsMetrics(options) ? settle(graph, path, rec, options) : path;
}
