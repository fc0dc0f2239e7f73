export * from "./messages";
export * from "./prng";
