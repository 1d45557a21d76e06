/**
 * Task Runner
 *
 * Drives one task to a terminal state: the single mutating call, then a
 * poll loop that yields to the event loop between probes, bounded by a
 * wall-clock timeout and interruptible at each wait.
 *
 * The timeout is checked between steps. A backend call that never settles
 * holds the task until it does.
 */

import {
  ActionCancelledError,
  ActionTimeoutError,
  ResourceFailure,
  toEngineError,
  type EngineError,
} from "../errors.js";
import type { ResourceStateMachine } from "../lifecycle/state-machine.js";
import type { EngineLogger } from "../logging/logger.js";
import type { SchedulerConfig } from "../types.js";
import type { Task, TaskOutcome } from "./task.js";

export type RunOptions = {
  /** Wall-clock budget for the whole action, mutating call included */
  timeoutMs?: number;
  /** Cooperative cancellation, observed at the poll wait */
  signal?: AbortSignal;
};

export type TaskRunnerOptions = Pick<SchedulerConfig, "pollIntervalMs" | "defaultTimeoutMs">;

/**
 * Wait `ms` without blocking the event loop. Resolves false when the
 * signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class TaskRunner {
  constructor(
    private options: TaskRunnerOptions,
    private stateMachine: ResourceStateMachine,
    private logger: EngineLogger,
  ) {}

  /**
   * Resolves when the resource reaches (action, COMPLETE); rejects with a
   * `ResourceFailure` otherwise. The resource is never left IN_PROGRESS.
   */
  async run(task: Task, options: RunOptions = {}): Promise<void> {
    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    const startedAt = Date.now();
    const log = this.logger.withContext({
      resourceName: task.resource.name,
      action: task.action,
      taskId: task.id,
    });

    log.debug("Task started", { timeoutMs });

    try {
      let outcome = await task.advance();

      for (;;) {
        if (outcome.kind === "complete") {
          this.stateMachine.complete(task);
          log.info(`${task.action} complete`, {
            probes: task.probeCount,
            durationMs: Date.now() - startedAt,
            alreadyGone: outcome.alreadyGone ?? false,
          });
          return;
        }

        if (outcome.kind === "failed") {
          throw this.failWith(task, outcome.error, log);
        }

        const remaining = timeoutMs - (Date.now() - startedAt);
        if (remaining <= 0) {
          throw this.failWith(task, new ActionTimeoutError(task.action, timeoutMs), log);
        }

        log.trace(`Waiting on ${outcome.status}`);
        const waited = await sleep(Math.min(this.options.pollIntervalMs, remaining), options.signal);
        if (!waited) {
          throw this.failWith(task, await this.acknowledgeCancel(task, log), log);
        }

        if (Date.now() - startedAt >= timeoutMs) {
          throw this.failWith(task, new ActionTimeoutError(task.action, timeoutMs), log);
        }

        outcome = await task.advance();
      }
    } catch (error) {
      if (error instanceof ResourceFailure) throw error;
      // Anything else escaped the task itself; record it against the resource.
      throw this.failWith(task, toEngineError(error), log);
    } finally {
      await task.close();
      if (task.resource.inFlight) {
        task.resource.setInFlight(false);
      }
    }
  }

  private failWith(task: Task, cause: EngineError, log: EngineLogger): ResourceFailure {
    const failure = this.stateMachine.fail(task, cause);
    const level = cause.kind === "Cancelled" ? "warn" : "error";
    log[level](`${task.action} failed: ${failure.message}`, {
      kind: cause.kind,
      probes: task.probeCount,
    });
    return failure;
  }

  /**
   * One last probe so the remote operation's state is observed before the
   * task is abandoned
   */
  private async acknowledgeCancel(task: Task, log: EngineLogger): Promise<ActionCancelledError> {
    const finalOutcome: TaskOutcome = await task.probeOnce();
    const lastStatus = finalOutcome.status ?? task.lastStatus;
    log.warn("Cancellation requested, abandoning task", {
      finalOutcome: finalOutcome.kind,
      lastStatus,
    });
    return new ActionCancelledError(task.action, lastStatus);
  }
}
