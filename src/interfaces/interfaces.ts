import type { AlgoKey, Path, Position, WallFlags } from "../types/types";

export interface CellSpec {
  pos: Position;
  walls: WallFlags;
  label?: string;
}

export interface GridGraphInput {
  rows: number;
  cols: number;
  cells: Iterable<CellSpec>;
  markers?: { start?: Position; goal?: Position }; // documentary S/G from the source
}

export interface GridGraphOptions {
  start?: Position; // default (rows - 1, 0)
  goal?: Position; // default (0, cols - 1)
}

export interface SearchMetrics {
  timeMs: number;
  expanded: number;
  generated: number;
  maxFrontier: number;
  maxExplored: number;
  maxStructures: number; // maxFrontier + maxExplored, peaks tracked apart
  found: boolean;
  completeness: boolean | null; // null when the oracle was not run
  optimal: boolean | null;
  pathCost: number | null;
  pathLength: number | null; // positions in the path
}

export interface SearchOptions {
  withMetrics?: boolean;
  computeOptimality?: boolean; // implies withMetrics
}

// Options under which a search returns { path, metrics }
export type MetricsOptions =
  | { withMetrics: true; computeOptimality?: boolean }
  | { withMetrics?: boolean; computeOptimality: true };

export interface SearchResult {
  path: Path;
  metrics: SearchMetrics;
}

export interface OracleVerdict {
  completeness: boolean;
  optimal: boolean | null;
}

export interface ReportRow {
  algo: AlgoKey;
  heuristic: string; // "-" for uninformed searches
  path: Path;
  pathLabels: string;
  metrics: SearchMetrics;
}
