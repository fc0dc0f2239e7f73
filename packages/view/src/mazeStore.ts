import { createStore } from "zustand/vanilla";
import type { CellTag, Coord, Direction, GenerationState, MazeEvent } from "@shared/core";

export type WallView = Record<Direction, boolean>;

/** What a renderer needs to draw one maze. Cells are row-major, like the core grid. */
export type MazeView = {
  width: number;
  height: number;
  state: GenerationState;
  tags: CellTag[];
  walls: WallView[];
  solution: Coord[];
};

type MazeViewState = MazeView & {
  reset: (width: number, height: number) => void;
  apply: (ev: MazeEvent) => void;
};

const closed = (): WallView => ({ RIGHT: true, LEFT: true, TOP: true, BOTTOM: true });

/**
 * Presentation-side mirror of a maze, fed only by the core's event stream.
 * It has no handle on the core grid, so nothing here can change a carve or a solve.
 */
export const createMazeViewStore = () =>
  createStore<MazeViewState>()((set, get) => ({
    width: 0,
    height: 0,
    state: "NotStarted",
    tags: [],
    walls: [],
    solution: [],
    reset: (width, height) =>
      set({
        width,
        height,
        state: "NotStarted",
        tags: Array.from({ length: width * height }, () => "Untouched" as const),
        walls: Array.from({ length: width * height }, closed),
        solution: []
      }),
    apply: (ev) => {
      const { width } = get();
      switch (ev.kind) {
        case "phase":
          if (ev.state === "InProgress") get().reset(ev.width, ev.height);
          set({ state: ev.state });
          break;
        case "cell": {
          const tags = [...get().tags];
          tags[ev.y * width + ev.x] = ev.tag;
          set({ tags });
          break;
        }
        case "wall": {
          const walls = [...get().walls];
          const i = ev.y * width + ev.x;
          const prev = walls[i];
          if (prev) walls[i] = { ...prev, [ev.dir]: false };
          set({ walls });
          break;
        }
        case "solved":
          set({ solution: ev.path });
          break;
      }
    }
  }));

export type MazeViewStore = ReturnType<typeof createMazeViewStore>;
