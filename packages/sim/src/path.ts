import type { Coord } from "@shared/core";
import { DisconnectedGraphError } from "./errors";
import { DIRECTIONS, cellAt, cellIndex, hasPassage, neighborIndex, type Cell, type Grid } from "./grid";
import type { EventSink, Maze, StepBoundary } from "./maze";

/**
 * BFS from `end` back to `start`, so following parent links out of `start` already reads start -> end.
 * A perfect maze has exactly one path between any two cells, which makes it the shortest one too.
 */
export function solveMaze(grid: Grid, start: Coord, end: Coord): Coord[] {
  for (const c of grid.cells) c.parent = null;

  cellAt(grid, start.x, start.y);
  cellAt(grid, end.x, end.y);
  const from = cellIndex(start.x, start.y, grid.w);
  const to = cellIndex(end.x, end.y, grid.w);
  const frontier: number[] = [to];
  const visited = new Set<number>([to]);
  let head = 0;
  let found = false;

  while (head < frontier.length) {
    const i = frontier[head++]!;
    if (i === from) {
      found = true;
      break;
    }
    const cell = grid.cells[i]!;
    for (const d of DIRECTIONS) {
      const j = neighborIndex(i, d, grid.w, grid.h);
      if (j === undefined || visited.has(j)) continue;
      const next = grid.cells[j]!;
      if (!hasPassage(cell, next)) continue;
      visited.add(j);
      frontier.push(j);
      next.parent = i;
    }
  }
  if (!found) throw new DisconnectedGraphError(start, end);

  const path: Coord[] = [];
  let at: number | null = from;
  while (at !== null) {
    const c: Cell = grid.cells[at]!;
    path.push({ x: c.x, y: c.y });
    at = c.parent;
  }
  return path;
}

export function solveFinalizedMaze(maze: Maze): Coord[] {
  return solveMaze(maze, maze.start, maze.exit);
}

/** Moves along the solution, i.e. cells on the path minus one. */
export function shortestPathLength(maze: Maze): number {
  return solveFinalizedMaze(maze).length - 1;
}

function paintable(grid: Grid, path: readonly Coord[]) {
  return path
    .map(p => grid.cells[cellIndex(p.x, p.y, grid.w)]!)
    .filter(c => c.tag !== "StartOfMaze" && c.tag !== "EndOfMaze");
}

/** Tags every path cell except the two corners as `Solution`. */
export function paintSolution(grid: Grid, path: readonly Coord[], emit?: EventSink) {
  for (const c of paintable(grid, path)) {
    c.tag = "Solution";
    emit?.({ kind: "cell", x: c.x, y: c.y, tag: "Solution" });
  }
}

export async function paintSolutionStepwise(grid: Grid, path: readonly Coord[], boundary: StepBoundary, emit?: EventSink) {
  for (const c of paintable(grid, path)) {
    c.tag = "Solution";
    emit?.({ kind: "cell", x: c.x, y: c.y, tag: "Solution" });
    await boundary();
  }
}
