import { performance } from "node:perf_hooks";
import type { GridGraph } from "../grid/GridGraph";
import type { SearchMetrics } from "../interfaces/interfaces";
import type { Path } from "../types/types";
import { pathCost } from "./pathCost";

/**
 * Passive counters for one search invocation. Algorithms call `generated`
 * on every frontier insertion, `expanded` on every processed pop, and
 * `observe` after each insertion or removal.
 */
export class MetricsRecorder {
  private begin = 0;
  private nGenerated = 0;
  private nExpanded = 0;
  private peakFrontier = 0;
  private peakExplored = 0;

  start() {
    this.begin = performance.now();
  }

  generated() {
    this.nGenerated++;
  }

  expanded() {
    this.nExpanded++;
  }

  observe(frontierSize: number, exploredSize: number) {
    if (frontierSize > this.peakFrontier) this.peakFrontier = frontierSize;
    if (exploredSize > this.peakExplored) this.peakExplored = exploredSize;
  }

  finish(graph: GridGraph, path: Path): SearchMetrics {
    const timeMs = performance.now() - this.begin;
    const found = path.length > 0;
    return {
      timeMs,
      expanded: this.nExpanded,
      generated: this.nGenerated,
      maxFrontier: this.peakFrontier,
      maxExplored: this.peakExplored,
      // sum of the two peaks, not the peak of the sum
      maxStructures: this.peakFrontier + this.peakExplored,
      found,
      completeness: null,
      optimal: null,
      pathCost: found ? pathCost(graph, path) : null,
      pathLength: found ? path.length : null,
    };
  }
}
