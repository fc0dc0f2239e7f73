import type { CellTag } from "@shared/core";

/** Floor colour per lifecycle tag. */
export const TAG_COLORS: Record<CellTag, string> = {
  Untouched: "#2b2420",
  Current: "#ffa657",
  Completed: "#4a4f63",
  StartOfMaze: "#e2863a",
  EndOfMaze: "#49ff88",
  Solution: "#ffd79a"
};

export const TAG_GLYPHS: Record<CellTag, string> = {
  Untouched: ".",
  Current: "@",
  Completed: " ",
  StartOfMaze: "S",
  EndOfMaze: "E",
  Solution: "o"
};
