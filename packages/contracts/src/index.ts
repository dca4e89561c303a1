export * from "./random/random-source";
export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/system-random";
export * from "./schemas/parameters";
export * from "./schemas/route-export";
export * from "./types/error";
export * from "./types/parameters";
export * from "./types/result";
export * from "./utils/builder";
