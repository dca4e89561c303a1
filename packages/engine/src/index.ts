/**
 * @routesetter/engine
 *
 * Board model, route generation, scoring and export.
 */

export * from "./api";
export * from "./board";
export * from "./core/constants";
export * from "./core/geometry";
export * from "./generator";
export * from "./pipeline/trace";
export * from "./route";
export * from "./scoring";
export * from "./utils/ascii-renderer";
