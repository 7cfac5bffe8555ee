import { z } from "zod";
import { ConfigValidationError } from "../errors/errors";

// ---------------------------------------------------------------------------
// Issue formatting
// ---------------------------------------------------------------------------

/**
 * Formats a Zod issue path as a dot/bracket string.
 *
 *   []                     → "(root)"
 *   ["generate", "rows"]   → "generate.rows"
 *   ["algorithms", 1]      → "algorithms[1]"
 */
export function formatZodPath(path: readonly (string | number)[]): string {
  if (path.length === 0) return "(root)";
  return path
    .map((seg, i) => (typeof seg === "number" ? `[${seg}]` : i === 0 ? seg : `.${seg}`))
    .join("");
}

export function formatZodErrors(issues: readonly z.ZodIssue[]): string {
  return issues.map((issue) => `  ${formatZodPath(issue.path)}: ${issue.message}`).join("\n");
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const rate = z.number().min(0).max(1);

/** Batch of seeded random mazes instead of a maze file. */
const generateSchema = z.object({
  rows: z.number().int().min(1).max(1_000).default(5),
  cols: z.number().int().min(1).max(1_000).default(5),
  seed: z.number().int().nonnegative().default(42),
  trials: z.number().int().min(1).default(1),
  loopRate: rate.default(0),
  oneWayRate: rate.default(0),
});

export const runnerConfigSchema = z
  .object({
    /** Maze text file; the bundled data/maze.txt when neither this nor generate is set. */
    mazePath: z.string().min(1).optional(),
    tableOut: z.string().min(1).default("experiments/metrics.txt"),
    csvOut: z.string().min(1).optional(),
    algorithms: z.array(z.enum(["BFS", "DFS", "A*", "Greedy"])).min(1).default(["BFS", "DFS", "A*", "Greedy"]),
    /** A* and Greedy run once per entry. */
    heuristics: z.array(z.enum(["Manhattan", "Euclidean", "Zero"])).min(1).default(["Manhattan", "Euclidean"]),
    computeOptimality: z.boolean().default(true),
    generate: generateSchema.optional(),
  })
  .refine((cfg) => !(cfg.mazePath && cfg.generate), {
    message: "mazePath and generate cannot both be set",
    path: ["generate"],
  });

export type RunnerConfig = z.infer<typeof runnerConfigSchema>;

export type GenerateConfig = z.infer<typeof generateSchema>;

export function parseRunnerConfig(raw: unknown): RunnerConfig {
  const result = runnerConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigValidationError(formatZodErrors(result.error.issues));
  }
  return result.data;
}
