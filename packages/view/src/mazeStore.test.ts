import { describe, expect, it } from "vitest";
import { prng } from "@shared/core";
import { generateMaze, paintSolution, solveFinalizedMaze } from "@sim/core";
import { createMazeViewStore } from "./mazeStore";
import { renderText } from "./render";
import { TAG_COLORS } from "./palette";

const scripted = (...draws: number[]) => () => draws.shift() ?? 0;

describe("createMazeViewStore", () => {
  it("starts empty", () => {
    const store = createMazeViewStore();
    expect(store.getState()).toMatchObject({ width: 0, height: 0, state: "NotStarted", tags: [], walls: [] });
    expect(renderText(store.getState())).toBe("");
  });

  it("resets to a closed, untouched grid when generation starts", () => {
    const store = createMazeViewStore();
    store.getState().apply({ kind: "phase", width: 3, height: 2, state: "InProgress" });
    const view = store.getState();
    expect(view.state).toBe("InProgress");
    expect(view.tags).toEqual(Array(6).fill("Untouched"));
    expect(view.walls[5]).toEqual({ RIGHT: true, LEFT: true, TOP: true, BOTTOM: true });
  });

  it("applies cell and wall events at row-major positions", () => {
    const store = createMazeViewStore();
    const { apply } = store.getState();
    apply({ kind: "phase", width: 3, height: 2, state: "InProgress" });
    apply({ kind: "cell", x: 2, y: 1, tag: "Current" });
    apply({ kind: "wall", x: 2, y: 1, dir: "BOTTOM" });
    const view = store.getState();
    expect(view.tags[5]).toBe("Current");
    expect(view.walls[5]).toEqual({ RIGHT: true, LEFT: true, TOP: true, BOTTOM: false });
    expect(view.walls[2]).toEqual({ RIGHT: true, LEFT: true, TOP: true, BOTTOM: true });
  });

  it("mirrors a whole generation and solve from the event stream", () => {
    const store = createMazeViewStore();
    const { apply } = store.getState();
    const maze = generateMaze(4, 3, { rnd: prng(12), emit: apply });
    const path = solveFinalizedMaze(maze);
    paintSolution(maze, path, apply);
    apply({ kind: "solved", path });

    const view = store.getState();
    expect(view.state).toBe("Finalized");
    expect(view.tags).toEqual(maze.cells.map(c => c.tag));
    expect(view.walls).toEqual(maze.cells.map(c => c.walls));
    expect(view.solution).toEqual(path);
  });

  it("colours every lifecycle tag", () => {
    expect(Object.keys(TAG_COLORS).sort()).toEqual(
      ["Completed", "Current", "EndOfMaze", "Solution", "StartOfMaze", "Untouched"]
    );
  });
});

describe("renderText", () => {
  it("draws the pinned 2x2 maze with its openings", () => {
    const store = createMazeViewStore();
    const maze = generateMaze(2, 2, { rnd: scripted(0, 0, 0), start: 0, emit: store.getState().apply });
    expect(renderText(store.getState())).toBe(
      ["+---+---+", "|     E", "+---+   +", "  S     |", "+---+---+"].join("\n")
    );

    paintSolution(maze, solveFinalizedMaze(maze), store.getState().apply);
    expect(renderText(store.getState()).split("\n")[3]).toBe("  S   o |");
  });

  it("shows cells that generation has not reached yet", () => {
    const store = createMazeViewStore();
    store.getState().reset(2, 1);
    expect(renderText(store.getState())).toBe(["+---+---+", "| . | . |", "+---+---+"].join("\n"));
  });
});
