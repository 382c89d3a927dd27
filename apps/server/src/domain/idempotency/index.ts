export * from "./types.js";
export * from "./fingerprint.js";
export * from "./memory-cache.js";
