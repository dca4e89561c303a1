export * from "./export";
export * from "./route";
export type * from "./types";
