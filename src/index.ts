/**
 * Resource Lifecycle Engine
 *
 * Drives declared infrastructure resources through create, update, delete,
 * suspend and resume by issuing one mutating call per action and polling
 * the remote side until it reports a terminal status.
 */

// Core Types
export * from "./types.js";

// Errors
export * from "./errors.js";

// Engine Facade
export {
  OrchestrationEngine,
  createEngine,
  type EngineOptions,
  type EngineConfigInput,
  type ActionOptions,
} from "./engine.js";

// Events
export { EngineEventBus } from "./events.js";

// Logging Subsystem
export * from "./logging/index.js";

// Configuration Validation
export * from "./validation/index.js";

// Retry
export {
  withRetry,
  createRetryRunner,
  shouldRetryError,
  computeBackoffMs,
  RETRY_DEFAULTS,
  RETRYABLE_CODES,
  type RetryConfig,
} from "./retry.js";

// Polling Protocol
export * from "./polling/index.js";

// Resources
export * from "./resources/index.js";

// Lifecycle
export * from "./lifecycle/index.js";

// Scheduling
export * from "./scheduler/index.js";

// Bundled Resource Types
export * from "./plugins/index.js";
