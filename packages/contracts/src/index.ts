export * from "./constants";
export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/system-random";
export * from "./schemas/board";
export * from "./schemas/solver";
export * from "./types/error";
export * from "./types/result";
export * from "./types/solver";
export * from "./utils/builder";
