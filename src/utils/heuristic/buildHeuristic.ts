import type { Heuristic, HeuristicType, Position } from "../../types/types";

// Admissibility is argued for symmetric unit-cost grids; mazes with one-way
// edges fall outside that argument.
export const manhattan = (a: Position, b: Position) =>
  Math.abs(a.r - b.r) + Math.abs(a.c - b.c);

export const euclidean = (a: Position, b: Position) => {
  const dr = a.r - b.r;
  const dc = a.c - b.c;
  return Math.sqrt(dr * dr + dc * dc);
};

export const zero = (_a: Position, _b: Position) => 0;

export function buildHeuristic(type: HeuristicType): Heuristic {
  switch (type) {
    case "Euclidean":
      return euclidean;
    case "Zero":
      return zero;
    default:
      return manhattan;
  }
}
