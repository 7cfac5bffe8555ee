import type { ReportRow } from "../interfaces/interfaces";

export const CSV_HEADER = [
  "trial",
  "algo",
  "heuristic",
  "timeMs",
  "expanded",
  "generated",
  "maxFrontier",
  "maxExplored",
  "maxStructures",
  "found",
  "completeness",
  "optimal",
  "pathCost",
  "pathLength",
].join(",");

const flag = (v: boolean | null) => (v == null ? "" : v ? "1" : "0");

export function toCsv(rows: { trial: number; row: ReportRow }[]): string {
  const lines = [CSV_HEADER];
  for (const { trial, row } of rows) {
    const m = row.metrics;
    lines.push(
      [
        trial.toString(),
        row.algo,
        row.heuristic,
        m.timeMs.toFixed(4),
        m.expanded.toString(),
        m.generated.toString(),
        m.maxFrontier.toString(),
        m.maxExplored.toString(),
        m.maxStructures.toString(),
        flag(m.found),
        flag(m.completeness),
        flag(m.optimal),
        m.pathCost == null ? "" : m.pathCost.toString(),
        m.pathLength == null ? "" : m.pathLength.toString(),
      ].join(",")
    );
  }
  return lines.join("\n");
}
