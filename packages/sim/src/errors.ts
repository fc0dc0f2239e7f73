export type MazeErrorCode =
  | "InvalidDimension"
  | "NotAdjacent"
  | "DisconnectedGraph"
  | "SolveBeforeFinalized"
  | "SolveInProgress"
  | "GenerationCancelled";

/** Base for every failure the core reports. None of them are transient. */
export class MazeError extends Error {
  constructor(readonly code: MazeErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidDimensionError extends MazeError {
  constructor(width: number, height: number) {
    super("InvalidDimension", `maze dimensions must be positive integers, got ${width}x${height}`);
  }
}

export class NotAdjacentError extends MazeError {
  constructor(a: { x: number; y: number }, b: { x: number; y: number }, dir: string) {
    super("NotAdjacent", `(${b.x},${b.y}) is not the ${dir} neighbour of (${a.x},${a.y})`);
  }
}

/** The grid handed to the solver is not a spanning tree; generation broke an invariant. */
export class DisconnectedGraphError extends MazeError {
  constructor(start: { x: number; y: number }, end: { x: number; y: number }) {
    super("DisconnectedGraph", `no passage connects (${start.x},${start.y}) to (${end.x},${end.y})`);
  }
}

export class SolveBeforeFinalizedError extends MazeError {
  constructor(state: string) {
    super("SolveBeforeFinalized", `cannot solve while generation is ${state}`);
  }
}

export class SolveInProgressError extends MazeError {
  constructor() {
    super("SolveInProgress", "a solve is already running against this maze");
  }
}

export class GenerationCancelledError extends MazeError {
  constructor() {
    super("GenerationCancelled", "generation was abandoned before it finished");
  }
}

export function isMazeError(err: unknown): err is MazeError {
  return err instanceof MazeError;
}
