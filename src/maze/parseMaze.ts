import { MazeParseError } from "../errors/errors";
import { DEFAULT_LABEL, GridGraph } from "../grid/GridGraph";
import type { CellSpec, GridGraphInput, GridGraphOptions } from "../interfaces/interfaces";
import type { Position, WallFlags } from "../types/types";
import { pos, samePos } from "../utils/utils";

// ---------- Maze text format ----------
//
//   1010:AS 0110:B 0011:CG
//
// One row per line, cells split by whitespace. Each cell is four wall bits
// N S E W (1 = blocked), then an optional ":L" one-character label, then an
// optional S (start) and/or G (goal) marker. Lines starting with # are
// comments.

const BITS_RE = /^[01]{4}$/;
const SUFFIX_RE = /^(S|G|SG|GS)?$/;

function parseToken(token: string, line: number, column: number) {
  if (token.length < 4) {
    throw new MazeParseError(`token "${token}" is shorter than four wall bits`, line, column);
  }
  const bits = token.slice(0, 4);
  if (!BITS_RE.test(bits)) {
    throw new MazeParseError(`wall bits "${bits}" must be 0 or 1`, line, column);
  }
  let rest = token.slice(4);
  let label: string | undefined;
  if (rest.startsWith(":")) {
    const chars = [...rest.slice(1)];
    if (chars.length === 0) {
      throw new MazeParseError(`missing label after ":" in "${token}"`, line, column);
    }
    label = chars[0];
    rest = chars.slice(1).join("");
  }
  if (!SUFFIX_RE.test(rest)) {
    throw new MazeParseError(`invalid suffix "${rest}" in "${token}"`, line, column);
  }
  const walls: WallFlags = [bits[0] === "1", bits[1] === "1", bits[2] === "1", bits[3] === "1"];
  return { walls, label, start: rest.includes("S"), goal: rest.includes("G") };
}

/** Parses maze text into a graph description without building the graph. */
export function parseMazeInput(text: string): GridGraphInput {
  const cells: CellSpec[] = [];
  let cols = -1;
  let r = 0;
  let start: Position | undefined;
  let goal: Position | undefined;

  const lines = text.split(/\r?\n/);
  for (let idx = 0; idx < lines.length; idx++) {
    const line = idx + 1;
    const trimmed = lines[idx].trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const tokens = trimmed.split(/\s+/);
    if (cols === -1) cols = tokens.length;
    if (tokens.length !== cols) {
      throw new MazeParseError(`row has ${tokens.length} cells, expected ${cols}`, line);
    }
    for (let c = 0; c < tokens.length; c++) {
      const cell = parseToken(tokens[c], line, c + 1);
      const here = pos(r, c);
      if (cell.start) {
        if (start) throw new MazeParseError("more than one start marker", line, c + 1);
        start = here;
      }
      if (cell.goal) {
        if (goal) throw new MazeParseError("more than one goal marker", line, c + 1);
        goal = here;
      }
      cells.push({ pos: here, walls: cell.walls, label: cell.label });
    }
    r++;
  }

  if (r === 0) throw new MazeParseError("maze is empty", 1);
  return { rows: r, cols, cells, markers: { start, goal } };
}

export function parseMaze(text: string, options?: GridGraphOptions): GridGraph {
  return new GridGraph(parseMazeInput(text), options);
}

export function serializeMaze(graph: GridGraph): string {
  const lines: string[] = [];
  for (let r = 0; r < graph.rows; r++) {
    const tokens: string[] = [];
    for (let c = 0; c < graph.cols; c++) {
      const here = pos(r, c);
      let token = graph
        .wallsAt(here)
        .map((blocked) => (blocked ? "1" : "0"))
        .join("");
      const label = graph.labelAt(here);
      if (label !== DEFAULT_LABEL) token += `:${label}`;
      if (samePos(here, graph.start())) token += "S";
      if (samePos(here, graph.goal())) token += "G";
      tokens.push(token);
    }
    lines.push(tokens.join(" "));
  }
  return lines.join("\n");
}
