import { pickIndex, type CellTag, type Coord, type Direction, type GenerationState, type MazeEvent, type RandomSource } from "@shared/core";
import { GenerationCancelledError } from "./errors";
import { DIRECTIONS, OPPOSITE, createGrid, neighborIndex, removeWallPair, type Grid } from "./grid";

/** A finalized grid with its entrance and exit corners. */
export type Maze = Grid & { start: Coord; exit: Coord };

export type EventSink = (ev: MazeEvent) => void;

/** Awaited between units of work in stepwise runs; this is where a host renders or sleeps. */
export type StepBoundary = () => void | Promise<void>;

export type GenerateOptions = {
  rnd?: RandomSource;
  /** Index of the cell DFS starts from; random when omitted. */
  start?: number;
  emit?: EventSink;
};

export type StepwiseOptions = GenerateOptions & {
  boundary: StepBoundary;
  isCancelled?: () => boolean;
};

const noop: EventSink = () => {};

/**
 * Randomized depth-first search (recursive backtracker) over one grid, one unit of work per `step()`.
 *
 * A unit is either carving into a fresh neighbour or backtracking out of a dead end. Once every cell
 * has been backtracked out of, the path stack is empty again and the maze is finalized: (0,0) gets its
 * LEFT wall opened as the entrance and (w-1,h-1) its RIGHT wall as the exit.
 */
export class MazeGenerator {
  readonly grid: Grid;
  private phase: GenerationState = "NotStarted";
  private readonly path: number[] = [];
  private readonly onPath = new Set<number>();
  private readonly completed = new Set<number>();
  private readonly rnd: RandomSource;
  private readonly emit: EventSink;
  private readonly startIndex?: number;

  constructor(grid: Grid, opts: GenerateOptions = {}) {
    this.grid = grid;
    this.rnd = opts.rnd ?? Math.random;
    this.emit = opts.emit ?? noop;
    if (opts.start !== undefined && !(Number.isInteger(opts.start) && opts.start >= 0 && opts.start < grid.cells.length)) {
      throw new RangeError(`start index ${opts.start} is outside the grid`);
    }
    this.startIndex = opts.start;
  }

  get state(): GenerationState {
    return this.phase;
  }

  /** Current DFS path, oldest first. */
  get pathStack(): readonly number[] {
    return this.path;
  }

  get completedCount() {
    return this.completed.size;
  }

  /** Runs one unit of work; false once the maze is finalized. */
  step(): boolean {
    if (this.phase === "Finalized") return false;
    if (this.phase === "NotStarted") {
      this.begin();
      return true;
    }

    const current = this.path[this.path.length - 1]!;
    const candidates: [number, Direction][] = [];
    for (const d of DIRECTIONS) {
      const n = neighborIndex(current, d, this.grid.w, this.grid.h);
      if (n !== undefined && !this.completed.has(n) && !this.onPath.has(n)) candidates.push([n, d]);
    }

    if (candidates.length > 0) {
      const [next, dir] = candidates[pickIndex(this.rnd, candidates.length)]!;
      this.carve(current, next, dir);
      this.path.push(next);
      this.onPath.add(next);
      this.tag(next, "Current");
    } else {
      // dead end
      this.path.pop();
      this.onPath.delete(current);
      this.completed.add(current);
      this.tag(current, "Completed");
    }

    if (this.completed.size === this.grid.cells.length) {
      this.finalize();
      return false;
    }
    return true;
  }

  get maze(): Maze {
    if (this.phase !== "Finalized") throw new Error(`maze is not finalized (state ${this.phase})`);
    return { ...this.grid, start: { x: 0, y: 0 }, exit: { x: this.grid.w - 1, y: this.grid.h - 1 } };
  }

  private begin() {
    const first = this.startIndex ?? pickIndex(this.rnd, this.grid.cells.length);
    this.setPhase("InProgress");
    this.path.push(first);
    this.onPath.add(first);
    this.tag(first, "Current");
  }

  private finalize() {
    const first = this.grid.cells[0]!;
    const lastIndex = this.grid.cells.length - 1;
    const last = this.grid.cells[lastIndex]!;
    this.tag(0, "StartOfMaze");
    first.walls.LEFT = false;
    this.emit({ kind: "wall", x: first.x, y: first.y, dir: "LEFT" });
    this.tag(lastIndex, "EndOfMaze");
    last.walls.RIGHT = false;
    this.emit({ kind: "wall", x: last.x, y: last.y, dir: "RIGHT" });
    this.setPhase("Finalized");
  }

  private carve(from: number, to: number, dir: Direction) {
    const a = this.grid.cells[from]!;
    const b = this.grid.cells[to]!;
    removeWallPair(a, b, dir);
    this.emit({ kind: "wall", x: a.x, y: a.y, dir });
    this.emit({ kind: "wall", x: b.x, y: b.y, dir: OPPOSITE[dir] });
  }

  private tag(index: number, tag: CellTag) {
    const c = this.grid.cells[index]!;
    c.tag = tag;
    this.emit({ kind: "cell", x: c.x, y: c.y, tag });
  }

  private setPhase(state: GenerationState) {
    this.phase = state;
    this.emit({ kind: "phase", width: this.grid.w, height: this.grid.h, state });
  }
}

/** Drives a generator to the end without pausing. */
export function runToCompletion(gen: MazeGenerator): Maze {
  while (gen.step()) {
    // drain
  }
  return gen.maze;
}

/** Drives a generator one unit at a time, awaiting `boundary` in between. */
export async function runStepwise(gen: MazeGenerator, boundary: StepBoundary, isCancelled?: () => boolean): Promise<Maze> {
  while (gen.step()) {
    await boundary();
    if (isCancelled?.()) throw new GenerationCancelledError();
  }
  return gen.maze;
}

/** Generates a whole maze in one go. */
export function generateMaze(w: number, h: number, opts: GenerateOptions = {}): Maze {
  return runToCompletion(new MazeGenerator(createGrid(w, h), opts));
}

/** Same walk as `generateMaze`, awaiting `boundary` after every unit so a host can show progress. */
export function generateMazeStepwise(w: number, h: number, opts: StepwiseOptions): Promise<Maze> {
  return runStepwise(new MazeGenerator(createGrid(w, h), opts), opts.boundary, opts.isCancelled);
}
