import type { ReportRow } from "../interfaces/interfaces";

const HEADERS = [
  "Algorithm",
  "Heuristic",
  "Time(ms)",
  "Expanded",
  "Generated",
  "Explored",
  "Frontier",
  "Peak memory",
  "Complete",
  "Optimal",
  "Cost",
  "Path",
];

export const boolCell = (v: boolean | null) => (v === true ? "yes" : v === false ? "no" : "-");

function cellsOf({ algo, heuristic, pathLabels, metrics: m }: ReportRow): string[] {
  return [
    algo,
    heuristic,
    m.timeMs.toFixed(3),
    `${m.expanded}`,
    `${m.generated}`,
    `${m.maxExplored}`,
    `${m.maxFrontier}`,
    `${m.maxStructures}`,
    boolCell(m.completeness),
    boolCell(m.optimal),
    m.pathCost == null ? "-" : `${m.pathCost}`,
    pathLabels,
  ];
}

/** Pads every column to its widest cell; columns joined by " | ". */
export function formatTable(rows: ReportRow[]): string {
  const data = rows.map(cellsOf);
  const widths = HEADERS.map((h, i) => Math.max(h.length, ...data.map((row) => row[i].length)));
  const fmtRow = (cols: string[]) => cols.map((c, i) => c.padEnd(widths[i])).join(" | ");
  const sep = widths.map((w) => "-".repeat(w)).join("-+-");
  return [fmtRow(HEADERS), sep, ...data.map(fmtRow)].join("\n");
}
