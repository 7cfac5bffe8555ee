import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { MazeError } from "../errors/errors";
import type { GridGraph } from "../grid/GridGraph";
import type { GridGraphOptions } from "../interfaces/interfaces";
import { parseMaze } from "../maze/parseMaze";

export function isEnoent(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function readText(path: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (err) {
    if (isEnoent(err)) throw new MazeError(`file not found: ${path}`);
    throw err;
  }
}

export function loadMaze(path: string, options?: GridGraphOptions): GridGraph {
  return parseMaze(readText(path), options);
}

export function readJsonFile(path: string): unknown {
  const text = readText(path);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new MazeError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

// Creates parent directories; always ends the file with a newline
export function writeReport(path: string, text: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, text.endsWith("\n") ? text : `${text}\n`, "utf8");
}
