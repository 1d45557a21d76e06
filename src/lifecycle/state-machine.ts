/**
 * Resource State Machine
 *
 * Tracks the `(action, status)` pair of every resource, validates requested
 * transitions and turns them into tasks. Terminal transitions are applied
 * here on behalf of the task runner so that the state and the emitted
 * events never disagree.
 */

import { isDeepStrictEqual } from "node:util";
import {
  InvalidAttributeError,
  InvalidTransitionError,
  NotFoundError,
  PropertyValidationError,
  ReplacementRequiredError,
  ResourceBusyError,
  ResourceFailure,
  type EngineError,
} from "../errors.js";
import type { EngineEventBus } from "../events.js";
import type { EngineLogger } from "../logging/logger.js";
import type { ResourceInstance } from "../resources/instance.js";
import { createRetryRunner } from "../retry.js";
import { Task, type ProbeInvoker, type TaskPlan } from "../scheduler/task.js";
import type {
  LifecycleAction,
  ResourceProperties,
  ResourceState,
  RetryOptions,
  StateChangeEvent,
} from "../types.js";

// =============================================================================
// Transition Rules
// =============================================================================

/**
 * Whether `action` may start from `state`. Identity requirements are
 * checked separately.
 */
export function isTransitionAllowed(state: ResourceState, action: LifecycleAction): boolean {
  if (state.status === "IN_PROGRESS") return false;

  switch (action) {
    case "CREATE":
      return (
        (state.action === "INIT" && state.status === "COMPLETE") ||
        (state.action === "CREATE" && state.status === "FAILED")
      );
    case "UPDATE":
      return state.action !== "DELETE";
    case "SUSPEND":
      return state.status === "COMPLETE" && state.action !== "DELETE";
    case "RESUME":
      return state.action === "SUSPEND" && state.status === "COMPLETE";
    case "DELETE":
      return true;
  }
}

/**
 * Keys whose values differ between two property sets, mapped to the new
 * value (undefined when the key was dropped).
 */
export function diffProperties(
  before: Readonly<ResourceProperties>,
  after: Readonly<ResourceProperties>,
): ResourceProperties {
  const diff: ResourceProperties = {};
  const keys = new Set([...Object.keys(before), ...Object.keys(after)]);
  for (const key of keys) {
    if (!isDeepStrictEqual(before[key], after[key])) {
      diff[key] = after[key];
    }
  }
  return diff;
}

// =============================================================================
// State Machine
// =============================================================================

export type PerformOptions = {
  /** New raw properties, UPDATE only */
  properties?: unknown;
};

export type StateMachineOptions = {
  /** Retry policy for transient probe failures */
  probeRetry?: RetryOptions;
};

export class ResourceStateMachine {
  private invokeProbe: ProbeInvoker;

  constructor(
    private events: EngineEventBus,
    private logger: EngineLogger,
    options: StateMachineOptions = {},
  ) {
    const retry = createRetryRunner(options.probeRetry);
    this.invokeProbe = (probe) => retry(probe);
  }

  /**
   * Start `action` on `resource` and return the task that completes it.
   *
   * Throws `ResourceBusyError`, `InvalidTransitionError`,
   * `PropertyValidationError` or `ReplacementRequiredError` without touching
   * the resource, and a `ResourceFailure` (NotFound) after marking the
   * resource FAILED when the action needs an identity it does not have.
   */
  perform(resource: ResourceInstance, action: LifecycleAction, options: PerformOptions = {}): Task {
    if (resource.inFlight) {
      throw new ResourceBusyError(resource.name);
    }

    if (action === "DELETE" && resource.action === "DELETE" && resource.status === "COMPLETE") {
      this.logger.debug(`${resource.name} is already deleted`);
      return this.start(resource, action, { mutate: null, poll: false });
    }

    if (action !== "CREATE" && resource.identity === undefined) {
      const cause = new NotFoundError(
        `Cannot ${action.toLowerCase()} ${resource.name}, resource not found`,
      );
      throw this.reject(resource, action, cause);
    }

    if (!isTransitionAllowed(resource.state, action)) {
      throw new InvalidTransitionError(resource.state, action);
    }
    if (action === "CREATE" && resource.identity !== undefined) {
      throw new InvalidTransitionError(resource.state, action);
    }

    return this.start(resource, action, this.plan(resource, action, options));
  }

  /**
   * Pre-flight validation through the backend, when it offers one
   */
  async validate(resource: ResourceInstance): Promise<void> {
    await resource.backend.validate?.(resource.properties);
  }

  /**
   * Look up an attribute of the remote entity. `"show"` returns every
   * attribute.
   */
  async getAttribute(resource: ResourceInstance, name: string): Promise<unknown> {
    if (name !== "show" && !resource.definition.attributes.includes(name)) {
      throw new InvalidAttributeError(resource.name, name);
    }

    const identity = resource.identity;
    if (identity === undefined) return undefined;

    const attributes = await resource.backend.showAttributes(identity);
    if (name === "show") return attributes;
    if (!Object.hasOwn(attributes, name)) {
      throw new InvalidAttributeError(resource.name, name);
    }
    return attributes[name];
  }

  /**
   * Apply the successful terminal transition of `task`
   */
  complete(task: Task): void {
    const { resource, action } = task;
    if (task.pendingProperties) {
      resource.commitProperties(task.pendingProperties);
    }
    this.transition(resource, action, "COMPLETE");
    resource.setInFlight(false);
  }

  /**
   * Apply the failed terminal transition of `task` and build the failure
   * to raise
   */
  fail(task: Task, cause: EngineError): ResourceFailure {
    const failure = this.reject(task.resource, task.action, cause);
    task.resource.setInFlight(false);
    return failure;
  }

  private reject(
    resource: ResourceInstance,
    action: LifecycleAction,
    cause: EngineError,
  ): ResourceFailure {
    const failure = new ResourceFailure(resource.name, action, cause);
    this.transition(resource, action, "FAILED", failure.message);
    return failure;
  }

  private start(resource: ResourceInstance, action: LifecycleAction, plan: TaskPlan): Task {
    this.transition(resource, action, "IN_PROGRESS");
    resource.setInFlight(true);
    return new Task(resource, action, plan, this.invokeProbe);
  }

  private plan(
    resource: ResourceInstance,
    action: LifecycleAction,
    options: PerformOptions,
  ): TaskPlan {
    const backend = resource.backend;

    switch (action) {
      case "CREATE":
        return {
          mutate: async () => {
            const identity = await backend.createRemote(resource.properties);
            resource.assignIdentity(identity);
          },
          poll: true,
        };
      case "UPDATE":
        return this.planUpdate(resource, options);
      case "DELETE":
        return {
          mutate: () => backend.deleteRemote(this.identityOf(resource)),
          poll: true,
        };
      case "SUSPEND": {
        const suspend = backend.suspendRemote?.bind(backend);
        return suspend
          ? { mutate: () => suspend(this.identityOf(resource)), poll: true }
          : { mutate: null, poll: false };
      }
      case "RESUME": {
        const resume = backend.resumeRemote?.bind(backend);
        return resume
          ? { mutate: () => resume(this.identityOf(resource)), poll: true }
          : { mutate: null, poll: false };
      }
    }
  }

  private planUpdate(resource: ResourceInstance, options: PerformOptions): TaskPlan {
    let after: ResourceProperties = { ...resource.properties };
    if (options.properties !== undefined) {
      const parsed = resource.definition.schema.safeParse(options.properties);
      if (!parsed.success) {
        throw new PropertyValidationError(
          resource.name,
          parsed.error.issues.map(
            (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
          ),
        );
      }
      after = parsed.data;
    }

    const diff = diffProperties(resource.properties, after);
    const changed = Object.keys(diff);
    const replacing = changed.filter((key) => resource.definition.replaceOnUpdate.includes(key));
    if (replacing.length > 0) {
      throw new ReplacementRequiredError(resource.name, replacing);
    }

    if (changed.length === 0) {
      return { mutate: null, poll: false, pendingProperties: after };
    }

    this.logger.debug(`Updating ${resource.name} in place`, { changed });
    return {
      mutate: () => resource.backend.updateRemote(this.identityOf(resource), diff, after),
      poll: true,
      pendingProperties: after,
    };
  }

  private identityOf(resource: ResourceInstance): string {
    const identity = resource.identity;
    if (identity === undefined) {
      throw new NotFoundError(`Resource ${resource.name} has no identity`);
    }
    return identity;
  }

  private transition(
    resource: ResourceInstance,
    action: LifecycleAction,
    status: ResourceState["status"],
    reason?: string,
  ): void {
    const from = resource.transition(action, status, reason);
    const to = resource.state;

    this.logger.debug(`State change: ${resource.name}`, {
      from: `${from.action}_${from.status}`,
      to: `${to.action}_${to.status}`,
    });

    const event: StateChangeEvent = { resourceName: resource.name, from, to, reason };
    void this.events.emit("resource:state-changed", "state-machine", event);
  }
}
