/**
 * Task Scheduler
 *
 * Accepts action requests by resource name and runs them through the state
 * machine and the task runner. Requests for the same resource are chained
 * and run one after another; requests for different resources interleave
 * freely on the event loop.
 */

import {
  ActionCancelledError,
  ResourceFailure,
  formatErrorMessage,
} from "../errors.js";
import type { EngineEventBus } from "../events.js";
import type { PerformOptions, ResourceStateMachine } from "../lifecycle/state-machine.js";
import type { EngineLogger } from "../logging/logger.js";
import type { ResourceSnapshot } from "../resources/instance.js";
import type { ResourceStore } from "../resources/store.js";
import type {
  EngineEventHandler,
  EngineEventType,
  LifecycleAction,
  TaskEvent,
} from "../types.js";
import type { Task } from "./task.js";
import type { TaskRunner } from "./task-runner.js";

export type SubmitOptions = PerformOptions & {
  /** Overrides the scheduler's default timeout for this action */
  timeoutMs?: number;
};

type PendingRequest = {
  resourceName: string;
  action: LifecycleAction;
  controller: AbortController;
};

export class TaskScheduler {
  private chains: Map<string, Promise<void>> = new Map();
  private requests: Set<PendingRequest> = new Set();
  private activeCount = 0;
  private queuedCount = 0;
  private closed = false;

  constructor(
    private store: ResourceStore,
    private stateMachine: ResourceStateMachine,
    private runner: TaskRunner,
    private events: EngineEventBus,
    private logger: EngineLogger,
  ) {}

  // ===========================================================================
  // Submission
  // ===========================================================================

  /**
   * Queue `action` on the named resource. Resolves with the resource's
   * snapshot once it reaches (action, COMPLETE).
   */
  submit(
    resourceName: string,
    action: LifecycleAction,
    options: SubmitOptions = {},
  ): Promise<ResourceSnapshot> {
    if (this.closed) {
      return Promise.reject(new Error("Scheduler has been shut down"));
    }
    try {
      this.store.require(resourceName);
    } catch (error) {
      return Promise.reject(error);
    }

    const request: PendingRequest = {
      resourceName,
      action,
      controller: new AbortController(),
    };
    this.requests.add(request);
    this.queuedCount++;
    this.emitTask("task:queued", { resourceName, action });

    const previous = this.chains.get(resourceName) ?? Promise.resolve();
    const result = previous.then(() => this.execute(request, options));

    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.chains.set(resourceName, tail);
    void tail.then(() => {
      if (this.chains.get(resourceName) === tail) {
        this.chains.delete(resourceName);
      }
    });

    return result;
  }

  private async execute(request: PendingRequest, options: SubmitOptions): Promise<ResourceSnapshot> {
    const { resourceName, action, controller } = request;
    this.queuedCount--;

    try {
      if (controller.signal.aborted) {
        this.logger.info(`Dropping cancelled ${action} of ${resourceName} before it started`);
        const error = new ActionCancelledError(action);
        this.emitTask("task:cancelled", { resourceName, action, error: error.message });
        throw error;
      }

      const resource = this.store.require(resourceName);
      const startedAt = Date.now();
      this.activeCount++;

      let task: Task;
      try {
        task = this.stateMachine.perform(resource, action, { properties: options.properties });
      } catch (error) {
        this.activeCount--;
        this.logger.warn(`${action} of ${resourceName} rejected: ${formatErrorMessage(error)}`);
        this.emitTask("task:failed", { resourceName, action, error: formatErrorMessage(error) });
        throw error;
      }
      this.emitTask("task:started", { taskId: task.id, resourceName, action });

      try {
        await this.runner.run(task, {
          timeoutMs: options.timeoutMs,
          signal: controller.signal,
        });
      } catch (error) {
        const type =
          error instanceof ResourceFailure && error.kind === "Cancelled"
            ? "task:cancelled"
            : "task:failed";
        this.emitTask(type, {
          taskId: task.id,
          resourceName,
          action,
          durationMs: Date.now() - startedAt,
          error: formatErrorMessage(error),
        });
        throw error;
      } finally {
        this.activeCount--;
      }

      this.emitTask("task:completed", {
        taskId: task.id,
        resourceName,
        action,
        durationMs: Date.now() - startedAt,
      });
      return resource.snapshot();
    } finally {
      this.requests.delete(request);
    }
  }

  // ===========================================================================
  // Cancellation
  // ===========================================================================

  /**
   * Cancel every queued or running action of one resource. Returns the
   * number of requests signalled.
   */
  cancel(resourceName: string): number {
    let count = 0;
    for (const request of this.requests) {
      if (request.resourceName === resourceName && !request.controller.signal.aborted) {
        request.controller.abort();
        count++;
      }
    }
    if (count > 0) {
      this.logger.info(`Cancellation requested for ${resourceName}`, { requests: count });
    }
    return count;
  }

  cancelAll(): number {
    let count = 0;
    for (const request of this.requests) {
      if (!request.controller.signal.aborted) {
        request.controller.abort();
        count++;
      }
    }
    return count;
  }

  /**
   * Resolves once every submitted action has settled
   */
  async waitForIdle(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all(this.chains.values());
    }
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    const cancelled = this.cancelAll();
    this.logger.info("Shutting down scheduler", { cancelled });
    await this.waitForIdle();
  }

  // ===========================================================================
  // Introspection & Events
  // ===========================================================================

  getActiveCount(): number {
    return this.activeCount;
  }

  getQueuedCount(): number {
    return this.queuedCount;
  }

  on<T = unknown>(eventType: EngineEventType, handler: EngineEventHandler<T>): () => void {
    return this.events.on(eventType, handler);
  }

  private emitTask(type: EngineEventType, data: TaskEvent): void {
    void this.events.emit(type, "scheduler", data);
  }
}
