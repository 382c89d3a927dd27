export * from "./types.js";
export * from "./memory-store.js";
