import { describe, expect, it } from "vitest";
import { prng, type Coord, type MazeEvent } from "@shared/core";
import { DisconnectedGraphError } from "./errors";
import { cellAt, createGrid, directionBetween, hasPassage, removeWallPair } from "./grid";
import { generateMaze } from "./maze";
import { paintSolution, paintSolutionStepwise, shortestPathLength, solveFinalizedMaze, solveMaze } from "./path";

const scripted = (...draws: number[]) => () => draws.shift() ?? 0;

describe("solveMaze", () => {
  it("walks the pinned 2x2 layouts", () => {
    const viaRight = generateMaze(2, 2, { rnd: scripted(0, 0, 0), start: 0 });
    expect(solveFinalizedMaze(viaRight)).toEqual([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }]);

    const viaTop = generateMaze(2, 2, { rnd: scripted(0.99), start: 0 });
    expect(solveFinalizedMaze(viaTop)).toEqual([{ x: 0, y: 0 }, { x: 0, y: 1 }, { x: 1, y: 1 }]);
  });

  it("follows a hand-carved corridor", () => {
    const g = createGrid(3, 2);
    removeWallPair(cellAt(g, 0, 0), cellAt(g, 0, 1), "TOP");
    removeWallPair(cellAt(g, 0, 1), cellAt(g, 1, 1), "RIGHT");
    removeWallPair(cellAt(g, 1, 1), cellAt(g, 1, 0), "BOTTOM");
    removeWallPair(cellAt(g, 1, 0), cellAt(g, 2, 0), "RIGHT");
    removeWallPair(cellAt(g, 2, 0), cellAt(g, 2, 1), "TOP");
    expect(solveMaze(g, { x: 0, y: 0 }, { x: 2, y: 1 })).toEqual([
      { x: 0, y: 0 },
      { x: 0, y: 1 },
      { x: 1, y: 1 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 1 }
    ]);
  });

  it("returns a connected start-to-exit walk through open passages", () => {
    const maze = generateMaze(12, 9, { rnd: prng(77) });
    const path = solveFinalizedMaze(maze);
    expect(path[0]).toEqual({ x: 0, y: 0 });
    expect(path[path.length - 1]).toEqual({ x: 11, y: 8 });
    expect(new Set(path.map(p => `${p.x},${p.y}`)).size).toBe(path.length);
    for (let i = 1; i < path.length; i++) {
      const a = path[i - 1]!;
      const b = path[i]!;
      expect(hasPassage(cellAt(maze, a.x, a.y), cellAt(maze, b.x, b.y))).toBe(true);
    }
    expect(shortestPathLength(maze)).toBe(path.length - 1);
    expect(shortestPathLength(maze)).toBeGreaterThanOrEqual(11 + 8);
  });

  it("gives the identical path when solved twice", () => {
    const maze = generateMaze(10, 10, { rnd: prng(5) });
    const first = solveFinalizedMaze(maze);
    const second = solveFinalizedMaze(maze);
    expect(second).toEqual(first);
  });

  it("resets parent links at the start of every solve", () => {
    const maze = generateMaze(4, 4, { rnd: prng(8) });
    solveMaze(maze, { x: 3, y: 3 }, { x: 0, y: 0 });
    solveFinalizedMaze(maze);
    expect(cellAt(maze, 3, 3).parent).toBeNull();
    expect(cellAt(maze, 0, 0).parent).not.toBeNull();
  });

  it("handles a single-cell maze", () => {
    const maze = generateMaze(1, 1);
    expect(solveFinalizedMaze(maze)).toEqual([{ x: 0, y: 0 }]);
    expect(shortestPathLength(maze)).toBe(0);
  });

  it("raises DisconnectedGraph on a corrupted grid instead of returning a partial path", () => {
    const maze = generateMaze(5, 5, { rnd: prng(5) });
    const path = solveFinalizedMaze(maze);
    const a = cellAt(maze, path[1]!.x, path[1]!.y);
    const b = cellAt(maze, path[2]!.x, path[2]!.y);
    const dir = directionBetween(a, b);
    expect(dir).toBeDefined();
    if (dir) a.walls[dir] = true;

    expect(() => solveFinalizedMaze(maze)).toThrow(DisconnectedGraphError);
    expect(() => solveFinalizedMaze(maze)).toThrow("no passage connects (0,0) to (4,4)");
  });

  it("rejects endpoints outside the grid", () => {
    const maze = generateMaze(3, 3);
    expect(() => solveMaze(maze, { x: 0, y: 0 }, { x: 3, y: 3 })).toThrow(RangeError);
  });
});

describe("paintSolution", () => {
  it("tags the path but leaves both corners alone", () => {
    const maze = generateMaze(2, 2, { rnd: scripted(0, 0, 0), start: 0 });
    const events: MazeEvent[] = [];
    paintSolution(maze, solveFinalizedMaze(maze), ev => events.push(ev));
    expect(maze.cells.map(c => c.tag)).toEqual(["StartOfMaze", "Solution", "Completed", "EndOfMaze"]);
    expect(events).toEqual([{ kind: "cell", x: 1, y: 0, tag: "Solution" }]);
  });

  it("pauses once per painted cell in the stepwise form", async () => {
    const maze = generateMaze(6, 6, { rnd: prng(21) });
    const path: Coord[] = solveFinalizedMaze(maze);
    let pauses = 0;
    await paintSolutionStepwise(maze, path, () => { pauses++; });
    expect(pauses).toBe(path.length - 2);
    expect(maze.cells.filter(c => c.tag === "Solution")).toHaveLength(path.length - 2);
  });
});
