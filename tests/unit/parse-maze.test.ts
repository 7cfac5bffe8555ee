import { readFileSync } from "node:fs";
import { describe, expect, it } from "vitest";
import { bfs } from "../../src/algorithms";
import { MazeParseError, StartGoalMismatchError } from "../../src/errors/errors";
import { parseMaze, parseMazeInput, serializeMaze } from "../../src/maze/parseMaze";
import { labelsSequence } from "../../src/report/renderPath";
import { pos } from "../../src/utils/utils";

const SAMPLE = readFileSync(new URL("../../data/maze.txt", import.meta.url), "utf8");

describe("parseMazeInput", () => {
  it("reads bits, labels and markers", () => {
    const input = parseMazeInput("0110:AS 1001:BG");
    expect(input.rows).toBe(1);
    expect(input.cols).toBe(2);
    expect(input.markers).toEqual({ start: pos(0, 0), goal: pos(0, 1) });
    expect([...input.cells]).toEqual([
      { pos: pos(0, 0), walls: [false, true, true, false], label: "A" },
      { pos: pos(0, 1), walls: [true, false, false, true], label: "B" },
    ]);
  });

  it("treats a label of S as a label, not a marker", () => {
    const input = parseMazeInput("0000:S 0000:SS");
    expect(input.markers).toEqual({ start: pos(0, 1), goal: undefined });
    expect([...input.cells].map((c) => c.label)).toEqual(["S", "S"]);
  });

  it("accepts both markers on one cell", () => {
    expect(parseMazeInput("0000SG").markers).toEqual({ start: pos(0, 0), goal: pos(0, 0) });
  });

  it("skips comments and blank lines", () => {
    const input = parseMazeInput("\n# header\n0000 0000\n\n0000 0000\n");
    expect(input.rows).toBe(2);
    expect(input.cols).toBe(2);
  });
});

describe("parseMazeInput: errors", () => {
  const cases: [string, string][] = [
    ["0000 0000\n0000", "line 2: row has 1 cells, expected 2"],
    ["10A0S", 'line 1, cell 1: wall bits "10A0" must be 0 or 1'],
    ["0000 101", 'line 1, cell 2: token "101" is shorter than four wall bits'],
    ["0000X", 'line 1, cell 1: invalid suffix "X" in "0000X"'],
    ["0000SS", 'line 1, cell 1: invalid suffix "SS" in "0000SS"'],
    ["0000:", 'line 1, cell 1: missing label after ":" in "0000:"'],
    ["0000S 0000S", "line 1, cell 2: more than one start marker"],
    ["0000G\n# c\n0000G", "line 3, cell 1: more than one goal marker"],
    ["# only a comment\n", "line 1: maze is empty"],
  ];

  it.each(cases)("%j → %s", (text, message) => {
    expect(() => parseMazeInput(text)).toThrow(MazeParseError);
    expect(() => parseMazeInput(text)).toThrow(message);
  });
});

describe("parseMaze", () => {
  it("validates markers against the fixed corners", () => {
    expect(() => parseMaze("0000S 0000\n0000 0000G")).toThrow(StartGoalMismatchError);
  });

  it("allows a maze without markers", () => {
    const g = parseMaze("0000 0000\n0000 0000");
    expect(g.start()).toEqual(pos(1, 0));
    expect(g.goal()).toEqual(pos(0, 1));
  });

  it("loads the bundled 5x5 maze", () => {
    const g = parseMaze(SAMPLE);
    expect(g.rows).toBe(5);
    expect(g.cols).toBe(5);
    expect(g.labelAt(g.start())).toBe("U");
    expect(g.labelAt(g.goal())).toBe("E");
    // E may step down to J, J may not step up to E
    expect([...g.neighbors(pos(0, 4))]).toContainEqual(pos(1, 4));
    expect([...g.neighbors(pos(1, 4))]).not.toContainEqual(pos(0, 4));
  });

  it("finds the shortest route through the bundled maze", () => {
    const g = parseMaze(SAMPLE);
    const { path, metrics } = bfs(g, { withMetrics: true });
    expect(labelsSequence(g, path)).toBe("U(S) -> P -> K -> F -> G -> B -> C -> D -> E(G)");
    expect(metrics.pathCost).toBe(8);
    expect(metrics.expanded).toBe(25);
  });
});

describe("serializeMaze", () => {
  it("writes the bundled maze back unchanged", () => {
    const body = SAMPLE.split("\n")
      .filter((line) => line.trim() && !line.startsWith("#"))
      .join("\n");
    expect(serializeMaze(parseMaze(SAMPLE))).toBe(body);
  });

  it("omits default labels", () => {
    expect(serializeMaze(parseMaze("0101S 1010G"))).toBe("0101S 1010G");
  });
});
