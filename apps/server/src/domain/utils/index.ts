export * from "./backoff.js";
export * from "./retry.js";
export * from "./template.js";
export * from "./time.js";
export * from "./timeout.js";
export * from "./concurrency.js";
