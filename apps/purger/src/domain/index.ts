/**
 * Domain layer - pure business logic.
 *
 * Nothing here talks to a provider, Postgres or Redis; everything is
 * unit-testable without mocks.
 */

// Path validation
export * from "./paths/validate.js";

// Batch splitting
export * from "./batching/split.js";

// Utility functions
export * from "./utils/index.js";

// Payload builders
export * from "./payload-builders/index.js";

// Idempotency
export * from "./idempotency/index.js";
