import { describe, expect, it } from "vitest";
import { configFromArgs } from "../../src/config/cliArgs";
import { formatZodPath, parseRunnerConfig } from "../../src/config/config";
import { ConfigValidationError } from "../../src/errors/errors";

// ---------------------------------------------------------------------------
// parseRunnerConfig
// ---------------------------------------------------------------------------

describe("parseRunnerConfig: defaults", () => {
  it("empty object → all defaults applied", () => {
    const cfg = parseRunnerConfig({});
    expect(cfg.mazePath).toBeUndefined();
    expect(cfg.tableOut).toBe("experiments/metrics.txt");
    expect(cfg.csvOut).toBeUndefined();
    expect(cfg.algorithms).toEqual(["BFS", "DFS", "A*", "Greedy"]);
    expect(cfg.heuristics).toEqual(["Manhattan", "Euclidean"]);
    expect(cfg.computeOptimality).toBe(true);
    expect(cfg.generate).toBeUndefined();
  });

  it("undefined is treated as an empty object", () => {
    expect(parseRunnerConfig(undefined).tableOut).toBe("experiments/metrics.txt");
  });

  it("generate block fills its own defaults", () => {
    const cfg = parseRunnerConfig({ generate: { rows: 12 } });
    expect(cfg.generate).toEqual({
      rows: 12,
      cols: 5,
      seed: 42,
      trials: 1,
      loopRate: 0,
      oneWayRate: 0,
    });
  });
});

describe("parseRunnerConfig: errors", () => {
  it("unknown algorithm → ConfigValidationError naming the field", () => {
    const parse = () => parseRunnerConfig({ algorithms: ["BFS", "IDA*"] });
    expect(parse).toThrow(ConfigValidationError);
    expect(parse).toThrow("algorithms[1]");
  });

  it("rate above 1 is rejected", () => {
    expect(() => parseRunnerConfig({ generate: { oneWayRate: 1.5 } })).toThrow("generate.oneWayRate");
  });

  it("empty heuristic list is rejected", () => {
    expect(() => parseRunnerConfig({ heuristics: [] })).toThrow("heuristics");
  });

  it("mazePath together with generate is rejected", () => {
    expect(() => parseRunnerConfig({ mazePath: "m.txt", generate: {} })).toThrow(
      "generate: mazePath and generate cannot both be set"
    );
  });

  it("lists every issue", () => {
    try {
      parseRunnerConfig({ tableOut: "", computeOptimality: "yes" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        const lines = err.details.split("\n");
        expect(lines).toHaveLength(2);
        expect(lines[0].startsWith("  tableOut:")).toBe(true);
        expect(lines[1].startsWith("  computeOptimality:")).toBe(true);
      }
    }
  });
});

describe("formatZodPath", () => {
  it("formats root, nested and indexed paths", () => {
    expect(formatZodPath([])).toBe("(root)");
    expect(formatZodPath(["generate", "rows"])).toBe("generate.rows");
    expect(formatZodPath(["algorithms", 1])).toBe("algorithms[1]");
  });
});

// ---------------------------------------------------------------------------
// configFromArgs
// ---------------------------------------------------------------------------

describe("configFromArgs", () => {
  const noFile = (path: string): unknown => {
    throw new Error(`unexpected read of ${path}`);
  };

  it("no flags → defaults", () => {
    expect(configFromArgs([], noFile)).toEqual(parseRunnerConfig({}));
  });

  it("maps file flags", () => {
    const cfg = configFromArgs(
      ["--maze", "mazes/a.txt", "--out", "out/table.txt", "--csv", "out/a.csv", "--no-optimality"],
      noFile
    );
    expect(cfg.mazePath).toBe("mazes/a.txt");
    expect(cfg.tableOut).toBe("out/table.txt");
    expect(cfg.csvOut).toBe("out/a.csv");
    expect(cfg.computeOptimality).toBe(false);
  });

  it("--generate with numeric flags builds the generate block", () => {
    const cfg = configFromArgs(
      ["--generate", "--rows", "16", "--seed", "7", "--one-way-rate", "0.1"],
      noFile
    );
    expect(cfg.generate).toEqual({
      rows: 16,
      cols: 5,
      seed: 7,
      trials: 1,
      loopRate: 0,
      oneWayRate: 0.1,
    });
  });

  it("flags override the config file", () => {
    const cfg = configFromArgs(["--config", "run.json", "--trials", "3"], (path) => {
      expect(path).toBe("run.json");
      return { heuristics: ["Zero"], generate: { rows: 8, cols: 8, trials: 10 } };
    });
    expect(cfg.heuristics).toEqual(["Zero"]);
    expect(cfg.generate).toMatchObject({ rows: 8, cols: 8, trials: 3 });
  });

  it("non-numeric values are reported by the schema", () => {
    expect(() => configFromArgs(["--rows", "many"], noFile)).toThrow("generate.rows");
  });

  it("a config file that is not an object is reported", () => {
    expect(() => configFromArgs(["--config", "run.json"], () => [1, 2])).toThrow("(root)");
  });

  it("unknown flags are rejected", () => {
    expect(() => configFromArgs(["--bogus"], noFile)).toThrow();
  });
});
