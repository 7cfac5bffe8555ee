import type { GridGraph } from "../grid/GridGraph";
import type { Path } from "../types/types";
import { samePos } from "../utils/utils";

// ---------- Text Drawing ----------
// S / G on the endpoints, o on the rest of the path, . elsewhere
export function renderPath(graph: GridGraph, path: Path): string {
  const out = Array.from({ length: graph.rows }, () => new Array<string>(graph.cols).fill("."));
  for (const p of path) {
    if (!graph.inBounds(p)) {
      throw new RangeError(`path position (${p.r},${p.c}) outside the grid`);
    }
    out[p.r][p.c] = "o";
  }
  const s = graph.start();
  const g = graph.goal();
  out[s.r][s.c] = "S";
  out[g.r][g.c] = "G";
  return out.map((row) => row.join("")).join("\n");
}

export function labelsSequence(graph: GridGraph, path: Path): string {
  if (path.length === 0) return "-";
  return path
    .map((p) => {
      const ch = graph.labelAt(p);
      if (samePos(p, graph.start())) return `${ch}(S)`;
      if (samePos(p, graph.goal())) return `${ch}(G)`;
      return ch;
    })
    .join(" -> ");
}
