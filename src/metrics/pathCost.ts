import type { GridGraph } from "../grid/GridGraph";
import type { Path } from "../types/types";

// Sum of step costs; throws InvalidStepError on a pair that is not a move
export function pathCost(graph: GridGraph, path: Path): number {
  let cost = 0;
  for (let i = 1; i < path.length; i++) {
    cost += graph.stepCost(path[i - 1], path[i]);
  }
  return cost;
}
