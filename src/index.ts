export { ALGO_KEYS, astar, bfs, dfs, greedy, isInformed, runAlgorithm } from "./algorithms";
export { A_STAR_POLICY, GREEDY_POLICY, bestFirstSearch, type FrontierPolicy } from "./algorithms/bestFirst";
export { parseRunnerConfig, runnerConfigSchema, type RunnerConfig } from "./config/config";
export {
  ConfigValidationError,
  InvalidStepError,
  MalformedGraphError,
  MazeError,
  MazeParseError,
  StartGoalMismatchError,
} from "./errors/errors";
export { runSuite, runTrials } from "./experiments/runSuite";
export { DEFAULT_LABEL, GridGraph } from "./grid/GridGraph";
export type * from "./interfaces/interfaces";
export { loadMaze, writeReport } from "./io/files";
export { parseMaze, parseMazeInput, serializeMaze } from "./maze/parseMaze";
export { MetricsRecorder } from "./metrics/MetricsRecorder";
export { judge } from "./metrics/oracle";
export { pathCost } from "./metrics/pathCost";
export { toCsv } from "./report/csv";
export { formatTable } from "./report/formatTable";
export { labelsSequence, renderPath } from "./report/renderPath";
export type * from "./types/types";
export { buildHeuristic, euclidean, manhattan, zero } from "./utils/heuristic/buildHeuristic";
export { generateMaze, type MazeGenOptions } from "./utils/mapGen/mapGen";
export { pos, posKey, samePos } from "./utils/utils";
