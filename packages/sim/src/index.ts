export * from "./errors";
export * from "./grid";
export * from "./maze";
export * from "./path";
export * from "./session";
