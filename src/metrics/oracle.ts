import { bfs } from "../algorithms/BFS";
import type { GridGraph } from "../grid/GridGraph";
import type { OracleVerdict, SearchMetrics } from "../interfaces/interfaces";
import type { Path } from "../types/types";
import { pathCost } from "./pathCost";

/**
 * Judges a path against a fresh BFS run (shortest in edges under unit cost).
 *
 * completeness: the run and the oracle agree on whether a path exists.
 * optimal: equal cost when both found one, false when only the oracle did,
 * null when neither did.
 */
export function judge(graph: GridGraph, path: Path): OracleVerdict {
  const truth = bfs(graph);
  const found = path.length > 0;
  const truthFound = truth.length > 0;
  const completeness = found === truthFound;
  if (!truthFound) return { completeness, optimal: null };
  if (!found) return { completeness, optimal: false };
  return { completeness, optimal: pathCost(graph, path) === pathCost(graph, truth) };
}

export function withVerdict(
  graph: GridGraph,
  path: Path,
  metrics: SearchMetrics
): SearchMetrics {
  const { completeness, optimal } = judge(graph, path);
  return { ...metrics, completeness, optimal };
}
