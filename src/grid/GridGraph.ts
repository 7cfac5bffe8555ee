import { InvalidStepError, MalformedGraphError, StartGoalMismatchError } from "../errors/errors";
import type { CellSpec, GridGraphInput, GridGraphOptions } from "../interfaces/interfaces";
import type { Direction, Position, WallFlags } from "../types/types";
import { DIRS, pos, samePos } from "../utils/utils";

export const DEFAULT_LABEL = ".";

const DIR_BIT: Record<Direction, number> = { N: 1, S: 2, E: 4, W: 8 };

/**
 * Rectangular maze whose moves are permitted per cell and per direction.
 *
 * Each cell owns a 4-bit wall mask (N, S, E, W). A move A→B is allowed when
 * A's bit for that direction is clear and B is in bounds; B's mask plays no
 * part, so adjacency is directed and need not be symmetric.
 */
export class GridGraph {
  readonly rows: number;
  readonly cols: number;
  private readonly masks: Uint8Array;
  private readonly labels: string[];
  private readonly startPos: Position;
  private readonly goalPos: Position;

  constructor(input: GridGraphInput, options: GridGraphOptions = {}) {
    const { rows, cols } = input;
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
      throw new MalformedGraphError(`grid dimensions must be positive integers, got ${rows}x${cols}`);
    }
    this.rows = rows;
    this.cols = cols;
    this.masks = new Uint8Array(rows * cols);
    this.labels = new Array<string>(rows * cols).fill(DEFAULT_LABEL);

    const defined = new Uint8Array(rows * cols);
    for (const cell of input.cells) {
      const id = this.checkedCellId(cell);
      if (defined[id]) {
        throw new MalformedGraphError(`cell (${cell.pos.r},${cell.pos.c}) defined twice`);
      }
      defined[id] = 1;
      this.masks[id] = encodeWalls(cell);
      if (cell.label !== undefined) this.labels[id] = cell.label;
    }
    const hole = defined.indexOf(0);
    if (hole !== -1) {
      const { r, c } = this.posOf(hole);
      throw new MalformedGraphError(`missing cell (${r},${c}) in ${rows}x${cols} grid`);
    }

    this.startPos = options.start ?? pos(rows - 1, 0);
    this.goalPos = options.goal ?? pos(0, cols - 1);
    for (const [name, p] of [["start", this.startPos], ["goal", this.goalPos]] as const) {
      if (!this.inBounds(p)) {
        throw new MalformedGraphError(`${name} (${p.r},${p.c}) lies outside the grid`);
      }
    }
    const claimedStart = input.markers?.start;
    if (claimedStart && !samePos(claimedStart, this.startPos)) {
      throw new StartGoalMismatchError("start", claimedStart, this.startPos);
    }
    const claimedGoal = input.markers?.goal;
    if (claimedGoal && !samePos(claimedGoal, this.goalPos)) {
      throw new StartGoalMismatchError("goal", claimedGoal, this.goalPos);
    }
  }

  get size() {
    return this.rows * this.cols;
  }

  start(): Position {
    return this.startPos;
  }

  goal(): Position {
    return this.goalPos;
  }

  inBounds(p: Position) {
    return (
      Number.isInteger(p.r) &&
      Number.isInteger(p.c) &&
      p.r >= 0 &&
      p.r < this.rows &&
      p.c >= 0 &&
      p.c < this.cols
    );
  }

  idOf(p: Position) {
    if (!this.inBounds(p)) {
      throw new RangeError(`position (${p.r},${p.c}) outside ${this.rows}x${this.cols} grid`);
    }
    return p.r * this.cols + p.c;
  }

  posOf(id: number): Position {
    return pos(Math.floor(id / this.cols), id % this.cols);
  }

  isBlocked(p: Position, dir: Direction) {
    return (this.masks[this.idOf(p)] & DIR_BIT[dir]) !== 0;
  }

  wallsAt(p: Position): WallFlags {
    const m = this.masks[this.idOf(p)];
    return [(m & 1) !== 0, (m & 2) !== 0, (m & 4) !== 0, (m & 8) !== 0];
  }

  // at least one direction open (ignores bounds)
  passable(p: Position) {
    return this.masks[this.idOf(p)] !== 0b1111;
  }

  labelAt(p: Position) {
    return this.labels[this.idOf(p)];
  }

  *neighborIds(id: number): Generator<number, void, void> {
    const r = Math.floor(id / this.cols);
    const c = id % this.cols;
    const mask = this.masks[id];
    for (let i = 0; i < DIRS.length; i++) {
      if (mask & (1 << i)) continue;
      const nr = r + DIRS[i].dr;
      const nc = c + DIRS[i].dc;
      if (nr >= 0 && nr < this.rows && nc >= 0 && nc < this.cols) {
        yield nr * this.cols + nc;
      }
    }
  }

  *neighbors(p: Position): Generator<Position, void, void> {
    for (const id of this.neighborIds(this.idOf(p))) yield this.posOf(id);
  }

  stepCost(from: Position, to: Position): number {
    if (this.inBounds(from) && this.inBounds(to)) {
      const target = this.idOf(to);
      for (const id of this.neighborIds(this.idOf(from))) {
        if (id === target) return 1;
      }
    }
    throw new InvalidStepError(from, to);
  }

  private checkedCellId(cell: CellSpec) {
    const { r, c } = cell.pos;
    if (!this.inBounds(cell.pos)) {
      throw new MalformedGraphError(`cell (${r},${c}) outside ${this.rows}x${this.cols} grid`);
    }
    if (cell.label !== undefined && [...cell.label].length !== 1) {
      throw new MalformedGraphError(`label of cell (${r},${c}) must be one character, got "${cell.label}"`);
    }
    return r * this.cols + c;
  }
}

function encodeWalls(cell: CellSpec) {
  const { walls } = cell;
  if (!Array.isArray(walls) || walls.length !== 4 || walls.some((w) => typeof w !== "boolean")) {
    throw new MalformedGraphError(
      `walls of cell (${cell.pos.r},${cell.pos.c}) must be four booleans [N, S, E, W]`
    );
  }
  let mask = 0;
  walls.forEach((blocked, i) => {
    if (blocked) mask |= 1 << i;
  });
  return mask;
}
