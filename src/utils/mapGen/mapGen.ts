import { GridGraph } from "../../grid/GridGraph";
import type { CellSpec } from "../../interfaces/interfaces";
import type { Position } from "../../types/types";
import { DIRS, nextRandom, pos, rngLCG } from "../utils";

export interface MazeGenOptions {
  rows: number;
  cols: number;
  seed: number;
  loopRate?: number; // chance of knocking out an extra wall (both ways)
  oneWayRate?: number; // chance of closing one side of an open passage
}

const LABELS = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

// N<->S, E<->W
const OPPOSITE = [1, 0, 3, 2];

// ---------- Maze Generation ----------
// DFS backtracker from the start corner, then optional loops and one-way
// passages. Same options => same maze.
export function generateMaze({
  rows,
  cols,
  seed,
  loopRate = 0,
  oneWayRate = 0,
}: MazeGenOptions): GridGraph {
  const R = rngLCG(seed);
  const N = rows * cols;
  const walls: boolean[][] = Array.from({ length: N }, () => [true, true, true, true]);
  const idOf = (r: number, c: number) => r * cols + c;
  const inBounds = (r: number, c: number) => r >= 0 && r < rows && c >= 0 && c < cols;

  const carve = (id: number, d: number, nid: number) => {
    walls[id][d] = false;
    walls[nid][OPPOSITE[d]] = false;
  };

  const visited = new Uint8Array(N);
  const stack: Position[] = [pos(rows - 1, 0)];
  visited[idOf(rows - 1, 0)] = 1;
  const order = [0, 1, 2, 3];

  while (stack.length) {
    const cur = stack[stack.length - 1];

    // shuffle directions for randomness
    for (let i = order.length - 1; i > 0; i--) {
      const j = Math.floor(nextRandom(R) * (i + 1));
      [order[i], order[j]] = [order[j], order[i]];
    }

    let moved = false;
    for (const d of order) {
      const nr = cur.r + DIRS[d].dr;
      const nc = cur.c + DIRS[d].dc;
      if (!inBounds(nr, nc)) continue;
      const nid = idOf(nr, nc);
      if (visited[nid]) continue;
      visited[nid] = 1;
      carve(idOf(cur.r, cur.c), d, nid);
      stack.push(pos(nr, nc));
      moved = true;
      break;
    }
    if (!moved) stack.pop();
  }

  // only look S (1) and E (2) so each passage is visited once
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      for (const d of [1, 2]) {
        const nr = r + DIRS[d].dr;
        const nc = c + DIRS[d].dc;
        if (!inBounds(nr, nc)) continue;
        const id = idOf(r, c);
        const nid = idOf(nr, nc);
        if (walls[id][d] && nextRandom(R) < loopRate) carve(id, d, nid);
        if (!walls[id][d] && !walls[nid][OPPOSITE[d]] && nextRandom(R) < oneWayRate) {
          if (nextRandom(R) < 0.5) walls[id][d] = true;
          else walls[nid][OPPOSITE[d]] = true;
        }
      }
    }
  }

  const cells: CellSpec[] = walls.map((w, id) => ({
    pos: pos(Math.floor(id / cols), id % cols),
    walls: [w[0], w[1], w[2], w[3]],
    label: LABELS[id % LABELS.length],
  }));
  return new GridGraph({ rows, cols, cells });
}
