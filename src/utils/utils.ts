import type { Direction, Position } from "../types/types";

export const pos = (r: number, c: number): Position => ({ r, c });

export const posKey = (p: Position) => `${p.r},${p.c}`;

export const samePos = (a: Position, b: Position) => a.r === b.r && a.c === b.c;

// Fixed expansion order; bit i of a wall mask belongs to DIRS[i]
export const DIRS: readonly { dir: Direction; dr: number; dc: number }[] = [
  { dir: "N", dr: -1, dc: 0 },
  { dir: "S", dr: 1, dc: 0 },
  { dir: "E", dr: 0, dc: 1 },
  { dir: "W", dr: 0, dc: -1 },
];

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

export const nextRandom = (R: Generator<number, never, void>) => R.next().value;

// Walk parent pointers back from goal; [] when goal was never reached
export function reconstructPath(
  parents: Map<number, number | null>,
  goal: number
): number[] {
  if (!parents.has(goal)) return [];
  const path: number[] = [];
  let cur: number | null | undefined = goal;
  while (cur != null) {
    path.push(cur);
    cur = parents.get(cur);
  }
  return path.reverse();
}
