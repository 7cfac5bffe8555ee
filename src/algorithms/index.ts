import type { GridGraph } from "../grid/GridGraph";
import type { SearchOptions, SearchResult } from "../interfaces/interfaces";
import type { AlgoKey, Heuristic } from "../types/types";
import { manhattan } from "../utils/heuristic/buildHeuristic";
import { astar } from "./AStar";
import { bfs } from "./BFS";
import { dfs } from "./DFS";
import { greedy } from "./Greedy";

export const ALGO_KEYS: readonly AlgoKey[] = ["BFS", "DFS", "A*", "Greedy"];

export const isInformed = (key: AlgoKey) => key === "A*" || key === "Greedy";

// Always collects metrics; the heuristic is ignored by BFS and DFS
export function runAlgorithm(
  key: AlgoKey,
  graph: GridGraph,
  heuristic: Heuristic = manhattan,
  options: Pick<SearchOptions, "computeOptimality"> = {}
): SearchResult {
  const opts = { withMetrics: true, computeOptimality: options.computeOptimality } as const;
  switch (key) {
    case "BFS":
      return bfs(graph, opts);
    case "DFS":
      return dfs(graph, opts);
    case "A*":
      return astar(graph, heuristic, opts);
    case "Greedy":
      return greedy(graph, heuristic, opts);
  }
}

export { astar, bfs, dfs, greedy };
