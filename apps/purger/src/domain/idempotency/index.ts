export * from "./types.js";
export * from "./stores.js";
