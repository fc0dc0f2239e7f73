import type { Coord, GenerationState, RandomSource } from "@shared/core";
import { SolveBeforeFinalizedError, SolveInProgressError, isMazeError } from "./errors";
import { createGrid } from "./grid";
import { MazeGenerator, runStepwise, runToCompletion, type EventSink, type Maze, type StepBoundary } from "./maze";
import { paintSolution, paintSolutionStepwise, solveFinalizedMaze } from "./path";

export type GenerateRequest = { width: number; height: number; stepwise: boolean; rnd?: RandomSource; start?: number };

export type SessionOptions = {
  emit?: EventSink;
  /** Awaited between units of stepwise work. Defaults to a macrotask yield. */
  boundary?: StepBoundary;
};

const yieldToHost: StepBoundary = () => new Promise<void>(resolve => setImmediate(resolve));

/**
 * Host-facing controller for one maze slot: `generate` then `solve`.
 *
 * A new `generate` abandons whatever came before it; an abandoned stepwise run resolves to null and its
 * grid is never touched again. Only one solve may run against a generation at a time.
 */
export class MazeSession {
  private readonly emit: EventSink;
  private readonly boundary: StepBoundary;
  private generator?: MazeGenerator;
  private epoch = 0;
  private solving = false;

  constructor(opts: SessionOptions = {}) {
    this.emit = opts.emit ?? (() => {});
    this.boundary = opts.boundary ?? yieldToHost;
  }

  get state(): GenerationState {
    return this.generator?.state ?? "NotStarted";
  }

  /** The finalized maze, if there is one. */
  get maze(): Maze | undefined {
    return this.generator?.state === "Finalized" ? this.generator.maze : undefined;
  }

  /** Throws `InvalidDimensionError` synchronously, before the current maze is discarded. */
  generate(req: GenerateRequest): Promise<Maze | null> {
    const grid = createGrid(req.width, req.height);
    const epoch = ++this.epoch;
    const gen = new MazeGenerator(grid, {
      rnd: req.rnd,
      start: req.start,
      emit: ev => {
        if (epoch === this.epoch) this.emit(ev);
      }
    });
    this.generator = gen;
    this.solving = false;

    if (!req.stepwise) return Promise.resolve(runToCompletion(gen));
    return runStepwise(gen, this.boundary, () => epoch !== this.epoch).catch((err: unknown) => {
      if (isMazeError(err) && err.code === "GenerationCancelled") return null;
      throw err;
    });
  }

  /** Abandons the current generation, finished or not. Nothing resumes it. */
  discard() {
    this.epoch++;
    this.generator = undefined;
    this.solving = false;
  }

  /** Throws `SolveBeforeFinalizedError` / `SolveInProgressError` synchronously. */
  solve(opts: { stepwise?: boolean } = {}): Promise<Coord[]> {
    const gen = this.generator;
    if (!gen || gen.state !== "Finalized") throw new SolveBeforeFinalizedError(this.state);
    if (this.solving) throw new SolveInProgressError();

    const epoch = this.epoch;
    const emit: EventSink = ev => {
      if (epoch === this.epoch) this.emit(ev);
    };
    const maze = gen.maze;
    const path = solveFinalizedMaze(maze);
    if (!opts.stepwise) {
      paintSolution(maze, path, emit);
      emit({ kind: "solved", path });
      return Promise.resolve(path);
    }

    this.solving = true;
    return paintSolutionStepwise(maze, path, this.boundary, emit)
      .finally(() => {
        if (epoch === this.epoch) this.solving = false;
      })
      .then(() => {
        emit({ kind: "solved", path });
        return path;
      });
  }
}
