import { parseArgs } from "node:util";
import { parseRunnerConfig, type RunnerConfig } from "./config";

const OPTIONS = {
  config: { type: "string" },
  maze: { type: "string" },
  out: { type: "string" },
  csv: { type: "string" },
  generate: { type: "boolean" },
  rows: { type: "string" },
  cols: { type: "string" },
  seed: { type: "string" },
  trials: { type: "string" },
  "loop-rate": { type: "string" },
  "one-way-rate": { type: "string" },
  "no-optimality": { type: "boolean" },
} as const;

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

/**
 * Flags override the JSON config file (`--config`), which overrides the
 * schema defaults. Numeric flags are passed through as numbers and checked
 * by the schema.
 */
export function configFromArgs(
  argv: string[],
  readJson: (path: string) => unknown
): RunnerConfig {
  const { values } = parseArgs({ args: argv, options: OPTIONS, strict: true });
  const fromFile = values.config === undefined ? {} : readJson(values.config);
  // let the schema report a non-object config file
  if (!isRecord(fromFile)) return parseRunnerConfig(fromFile);
  const raw: Record<string, unknown> = { ...fromFile };

  if (values.maze !== undefined) raw.mazePath = values.maze;
  if (values.out !== undefined) raw.tableOut = values.out;
  if (values.csv !== undefined) raw.csvOut = values.csv;
  if (values["no-optimality"]) raw.computeOptimality = false;

  const genFlags: Record<string, string | undefined> = {
    rows: values.rows,
    cols: values.cols,
    seed: values.seed,
    trials: values.trials,
    loopRate: values["loop-rate"],
    oneWayRate: values["one-way-rate"],
  };
  const hasGenFlag = Object.values(genFlags).some((v) => v !== undefined);
  if (values.generate || hasGenFlag) {
    const generate: Record<string, unknown> = isRecord(raw.generate) ? { ...raw.generate } : {};
    for (const [key, value] of Object.entries(genFlags)) {
      if (value !== undefined) generate[key] = Number(value);
    }
    raw.generate = generate;
  }

  return parseRunnerConfig(raw);
}
