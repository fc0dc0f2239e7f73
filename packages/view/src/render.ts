import { TAG_GLYPHS } from "./palette";
import type { MazeView } from "./mazeStore";

/** Character drawing of a view, TOP row first. Trailing blanks are trimmed from each line. */
export function renderText(view: MazeView): string {
  const { width: w, height: h } = view;
  if (w === 0 || h === 0) return "";
  const lines: string[] = [];
  const at = (x: number, y: number) => y * w + x;

  for (let y = h - 1; y >= 0; y--) {
    let top = "";
    let mid = "";
    for (let x = 0; x < w; x++) {
      const walls = view.walls[at(x, y)];
      const tag = view.tags[at(x, y)] ?? "Untouched";
      top += "+" + (walls?.TOP === false ? "   " : "---");
      if (x === 0) mid += walls?.LEFT === false ? " " : "|";
      mid += ` ${TAG_GLYPHS[tag]} ` + (walls?.RIGHT === false ? " " : "|");
    }
    lines.push(top + "+", mid);
  }
  let bottom = "";
  for (let x = 0; x < w; x++) bottom += "+" + (view.walls[at(x, 0)]?.BOTTOM === false ? "   " : "---");
  lines.push(bottom + "+");
  return lines.map(l => l.trimEnd()).join("\n");
}
