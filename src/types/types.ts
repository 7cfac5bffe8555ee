export type Position = { readonly r: number; readonly c: number };

export type Path = Position[];

export type Direction = "N" | "S" | "E" | "W";

// [north, south, east, west]; true = blocked
export type WallFlags = readonly [boolean, boolean, boolean, boolean];

export type AlgoKey = "BFS" | "DFS" | "A*" | "Greedy";

export type HeuristicType = "Manhattan" | "Euclidean" | "Zero";

export type Heuristic = (a: Position, b: Position) => number;
