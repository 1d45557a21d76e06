/**
 * Resource Lifecycle Engine - Core Types
 *
 * This module defines the fundamental types shared by the lifecycle
 * state machine, the task scheduler and the resource type plugins.
 */

// =============================================================================
// Lifecycle Types
// =============================================================================

/**
 * Lifecycle actions a resource can be driven through
 */
export type ResourceAction = "INIT" | "CREATE" | "UPDATE" | "DELETE" | "SUSPEND" | "RESUME";

/**
 * Actions a caller may request (INIT is only ever the starting point)
 */
export type LifecycleAction = Exclude<ResourceAction, "INIT">;

/**
 * Status of the current action
 */
export type ResourceStatus = "IN_PROGRESS" | "COMPLETE" | "FAILED" | "UNKNOWN";

/**
 * The only externally observable lifecycle marker
 */
export type ResourceState = {
  action: ResourceAction;
  status: ResourceStatus;
};

export const RESOURCE_ACTIONS: readonly ResourceAction[] = [
  "INIT",
  "CREATE",
  "UPDATE",
  "DELETE",
  "SUSPEND",
  "RESUME",
];

/**
 * Validated resource properties
 */
export type ResourceProperties = Record<string, unknown>;

/**
 * Resource attribute map as returned by a backend's show call
 */
export type ResourceAttributes = Record<string, unknown>;

// =============================================================================
// Polling Types
// =============================================================================

/**
 * Phase suffix of a remote status string (`<ACTION>_<PHASE>`)
 */
export type PollPhase = "IN_PROGRESS" | "COMPLETE" | "FAILED";

/**
 * Classification of a remote status for the action in progress
 */
export type PollClassification = PollPhase | "UNKNOWN";

/**
 * Raw value produced by one probe of the remote side
 */
export type PollResult = {
  status: string;
  reason: string | null;
};

// =============================================================================
// Event Types
// =============================================================================

/**
 * Engine event types
 */
export type EngineEventType =
  | "task:queued"
  | "task:started"
  | "task:completed"
  | "task:failed"
  | "task:cancelled"
  | "resource:state-changed";

/**
 * Engine event
 */
export type EngineEvent<T = unknown> = {
  id: string;
  type: EngineEventType;
  timestamp: Date;
  source: string;
  data: T;
};

/**
 * Event handler type
 */
export type EngineEventHandler<T = unknown> = (event: EngineEvent<T>) => void | Promise<void>;

/**
 * Payload of `resource:state-changed`
 */
export type StateChangeEvent = {
  resourceName: string;
  from: ResourceState;
  to: ResourceState;
  reason?: string;
};

/**
 * Payload of the `task:*` events
 */
export type TaskEvent = {
  taskId?: string;
  resourceName: string;
  action: LifecycleAction;
  durationMs?: number;
  error?: string;
};

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Retry settings for transient probe failures
 */
export type RetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

/**
 * Scheduler configuration
 */
export type SchedulerConfig = {
  pollIntervalMs: number;
  defaultTimeoutMs: number;
  probeRetry: Required<RetryOptions>;
};

/**
 * Logging configuration
 */
export type LoggingConfig = {
  level: "trace" | "debug" | "info" | "warn" | "error" | "fatal";
  includeTimestamps: boolean;
  includeMetadata: boolean;
  destinations: LogDestination[];
  redactPatterns: string[];
};

/**
 * Log destination configuration
 */
export type LogDestination = {
  type: "console" | "file";
  config: Record<string, unknown>;
  filter?: {
    minLevel?: "trace" | "debug" | "info" | "warn" | "error" | "fatal";
  };
};

/**
 * Engine configuration
 */
export type EngineConfig = {
  stackName: string;
  scheduler: SchedulerConfig;
  logging: LoggingConfig;
};
