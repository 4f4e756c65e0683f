export * from "./board";
export * from "./permutations";
export * from "./successors";
