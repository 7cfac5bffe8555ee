/**
 * Typed errors raised by the maze core and its collaborators.
 *
 * An unreachable goal is not an error: searches report it as an empty path
 * with `found = false`.
 */

export class MazeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MazeError";
  }
}

/** Incomplete rectangle, duplicate or out-of-bounds cell, bad wall encoding. */
export class MalformedGraphError extends MazeError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedGraphError";
  }
}

export class StartGoalMismatchError extends MazeError {
  constructor(
    readonly marker: "start" | "goal",
    readonly claimed: { r: number; c: number },
    readonly expected: { r: number; c: number }
  ) {
    super(
      `${marker} marker at (${claimed.r},${claimed.c}) does not match expected (${expected.r},${expected.c})`
    );
    this.name = "StartGoalMismatchError";
  }
}

/** stepCost queried on a pair that is not a permitted move. Indicates a bug. */
export class InvalidStepError extends MazeError {
  constructor(
    readonly from: { r: number; c: number },
    readonly to: { r: number; c: number }
  ) {
    super(`no permitted move from (${from.r},${from.c}) to (${to.r},${to.c})`);
    this.name = "InvalidStepError";
  }
}

export class MazeParseError extends MazeError {
  constructor(message: string, readonly line: number, readonly column?: number) {
    super(
      column === undefined
        ? `line ${line}: ${message}`
        : `line ${line}, cell ${column}: ${message}`
    );
    this.name = "MazeParseError";
  }
}

export class ConfigValidationError extends MazeError {
  constructor(readonly details: string) {
    super(`Invalid runner config:\n${details}`);
    this.name = "ConfigValidationError";
  }
}
