export * from "./mazeStore";
export * from "./palette";
export * from "./render";
