export * from "./types.js";
export * from "./circuit-breaker.js";
