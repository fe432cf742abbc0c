export * from "./backoff.js";
export * from "./retry.js";
export * from "./caller-reference.js";
export * from "./time.js";
