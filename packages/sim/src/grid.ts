import type { CellTag, Coord, Direction } from "@shared/core";
import { InvalidDimensionError, NotAdjacentError } from "./errors";

export type Walls = Record<Direction, boolean>;

/** One grid cell. `parent` is the BFS back-link (a cell index), only meaningful after a solve. */
export type Cell = { x: number; y: number; walls: Walls; tag: CellTag; parent: number | null };

/** Row-major grid: cell (x, y) lives at `y * w + x`. */
export type Grid = { w: number; h: number; cells: Cell[] };

/** Fixed candidate order for both generation and solving. */
export const DIRECTIONS = ["RIGHT", "LEFT", "TOP", "BOTTOM"] as const satisfies readonly Direction[];

// y grows toward TOP
export const DELTA: Record<Direction, readonly [number, number]> = {
  RIGHT: [1, 0],
  LEFT: [-1, 0],
  TOP: [0, 1],
  BOTTOM: [0, -1]
};

export const OPPOSITE: Record<Direction, Direction> = {
  RIGHT: "LEFT",
  LEFT: "RIGHT",
  TOP: "BOTTOM",
  BOTTOM: "TOP"
};

export function createGrid(w: number, h: number): Grid {
  if (!Number.isInteger(w) || !Number.isInteger(h) || w < 1 || h < 1) {
    throw new InvalidDimensionError(w, h);
  }
  const cells: Cell[] = Array.from({ length: w * h }, (_, i) => ({
    x: i % w,
    y: Math.floor(i / w),
    walls: { RIGHT: true, LEFT: true, TOP: true, BOTTOM: true },
    tag: "Untouched",
    parent: null
  }));
  return { w, h, cells };
}

export const cellIndex = (x: number, y: number, w: number) => y * w + x;

export function cellAt(grid: Grid, x: number, y: number): Cell {
  const cell = grid.cells[cellIndex(x, y, grid.w)];
  if (!cell || x < 0 || x >= grid.w) throw new RangeError(`(${x},${y}) is outside the ${grid.w}x${grid.h} grid`);
  return cell;
}

export function neighborIndex(index: number, dir: Direction, w: number, h: number): number | undefined {
  const x = (index % w) + DELTA[dir][0];
  const y = Math.floor(index / w) + DELTA[dir][1];
  if (x < 0 || y < 0 || x >= w || y >= h) return undefined;
  return cellIndex(x, y, w);
}

/** Which side of `a` faces `b`, if they touch. */
export function directionBetween(a: Coord, b: Coord): Direction | undefined {
  return DIRECTIONS.find(d => a.x + DELTA[d][0] === b.x && a.y + DELTA[d][1] === b.y);
}

/** Knock down the wall between two adjacent cells, both faces at once. */
export function removeWallPair(a: Cell, b: Cell, dir: Direction) {
  if (a.x + DELTA[dir][0] !== b.x || a.y + DELTA[dir][1] !== b.y) throw new NotAdjacentError(a, b, dir);
  a.walls[dir] = false;
  b.walls[OPPOSITE[dir]] = false;
}

export function hasPassage(a: Cell, b: Cell): boolean {
  const dir = directionBetween(a, b);
  if (!dir) return false;
  return !a.walls[dir] && !b.walls[OPPOSITE[dir]];
}

/** Open internal wall pairs. Each is counted once, from its RIGHT/TOP side. */
export function countPassages(grid: Grid): number {
  let n = 0;
  grid.cells.forEach((c, i) => {
    for (const d of ["RIGHT", "TOP"] as const) {
      const j = neighborIndex(i, d, grid.w, grid.h);
      if (j !== undefined && hasPassage(c, grid.cells[j]!)) n++;
    }
  });
  return n;
}

/** Four bits per cell (RIGHT, LEFT, TOP, BOTTOM), for layout hashing. */
export function wallBytes(grid: Grid): Uint8Array {
  return Uint8Array.from(grid.cells, c => DIRECTIONS.reduce((bits, d, k) => bits | (c.walls[d] ? 1 << k : 0), 0));
}
