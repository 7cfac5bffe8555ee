import type { GridGraph } from "../grid/GridGraph";
import type { MetricsRecorder } from "../metrics/MetricsRecorder";
import type { Heuristic, Path } from "../types/types";
import { type HeapEntry, MinHeap } from "../utils/MinHeap/MinHeap";
import { reconstructPath } from "../utils/utils";
import { toPath } from "./result";

export interface FrontierPolicy {
  priority: (g: number, h: number) => number;
  // re-queue a frontier node when a cheaper g is found
  relax: boolean;
}

export const A_STAR_POLICY: FrontierPolicy = { priority: (g, h) => g + h, relax: true };

export const GREEDY_POLICY: FrontierPolicy = { priority: (_g, h) => h, relax: false };

/**
 * Priority-ordered search shared by A* and Greedy best-first.
 *
 * Expanded nodes are closed for good. When a frontier node is re-queued its
 * older heap entry is invalidated, so the frontier holds one live entry per
 * node and equal priorities pop in insertion order.
 */
export function bestFirstSearch(
  graph: GridGraph,
  heuristic: Heuristic,
  policy: FrontierPolicy,
  rec: MetricsRecorder
): Path {
  const start = graph.idOf(graph.start());
  const goal = graph.idOf(graph.goal());
  const goalPos = graph.goal();
  const hOf = (id: number) => heuristic(graph.posOf(id), goalPos);

  const heap = new MinHeap<number>();
  const entries = new Map<number, HeapEntry<number>>();
  const g = new Float64Array(graph.size).fill(Infinity);
  const closed = new Uint8Array(graph.size);
  let nClosed = 0;
  const parents = new Map<number, number | null>();
  parents.set(start, null);

  g[start] = 0;
  entries.set(start, heap.push(policy.priority(0, hOf(start)), start));
  rec.generated();
  rec.observe(heap.size(), nClosed);

  let n = heap.pop();
  while (n !== undefined) {
    entries.delete(n);
    closed[n] = 1;
    nClosed++;
    rec.expanded();
    rec.observe(heap.size(), nClosed);

    if (n === goal) return toPath(graph, reconstructPath(parents, goal));

    const from = graph.posOf(n);
    for (const m of graph.neighborIds(n)) {
      if (closed[m]) continue;
      const ng = g[n] + graph.stepCost(from, graph.posOf(m));
      const seen = g[m] !== Infinity;
      if (seen && !(policy.relax && ng < g[m])) continue;

      g[m] = ng;
      parents.set(m, n);
      const stale = entries.get(m);
      if (stale) heap.invalidate(stale);
      entries.set(m, heap.push(policy.priority(ng, hOf(m)), m));
      rec.generated();
      rec.observe(heap.size(), nClosed);
    }
    n = heap.pop();
  }
  return [];
}
