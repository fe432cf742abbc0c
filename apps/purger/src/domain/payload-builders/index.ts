/**
 * Payload builders - pure functions that turn a batch into provider wire format.
 */

export * from "./types.js";
export * from "./cloudfront.js";
export * from "./cloudflare.js";
export * from "./azure.js";
export * from "./sucuri.js";
export * from "./fastly.js";
