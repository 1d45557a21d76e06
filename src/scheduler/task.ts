/**
 * Task
 *
 * One lifecycle action on one resource, expressed as a lazily advanced
 * step sequence: the first step issues the single mutating call, every
 * later step is one status probe. The task runner pumps the sequence and
 * decides when to wait, finish or give up.
 */

import { randomUUID } from "node:crypto";
import {
  NotFoundError,
  ResourceInError,
  ResourceUnknownStatusError,
  isNotFound,
  toEngineError,
  type EngineError,
} from "../errors.js";
import { classifyStatus } from "../polling/status.js";
import type { ResourceInstance } from "../resources/instance.js";
import type { LifecycleAction, PollResult, ResourceProperties } from "../types.js";

/**
 * Outcome of one step
 */
export type TaskOutcome =
  | { kind: "progress"; status: string }
  | { kind: "complete"; status?: string; alreadyGone?: boolean }
  | { kind: "failed"; error: EngineError; status?: string };

/**
 * What the state machine decided this task has to do
 */
export type TaskPlan = {
  /** The mutating call; null when nothing has to be sent to the backend */
  mutate: (() => Promise<void>) | null;
  /** Whether completion is observed by probing */
  poll: boolean;
  /** Properties to commit once the action completes */
  pendingProperties?: ResourceProperties;
};

/**
 * Wraps every probe call; used to retry transient transport faults
 */
export type ProbeInvoker = (probe: () => Promise<PollResult>) => Promise<PollResult>;

const directInvoke: ProbeInvoker = (probe) => probe();

export class Task {
  readonly id = `task_${randomUUID()}`;
  readonly createdAt = new Date();
  private _probeCount = 0;
  private _mutatingCalls = 0;
  private _lastStatus?: string;
  private steps: AsyncGenerator<TaskOutcome, void, void> | null = null;
  private finished = false;

  constructor(
    readonly resource: ResourceInstance,
    readonly action: LifecycleAction,
    private plan: TaskPlan,
    private invokeProbe: ProbeInvoker = directInvoke,
  ) {}

  get probeCount(): number {
    return this._probeCount;
  }

  get mutatingCalls(): number {
    return this._mutatingCalls;
  }

  get lastStatus(): string | undefined {
    return this._lastStatus;
  }

  get pendingProperties(): ResourceProperties | undefined {
    return this.plan.pendingProperties;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Run the sequence up to its next outcome. The first call performs the
   * mutating call (and, when polling, the first probe).
   */
  async advance(): Promise<TaskOutcome> {
    if (this.finished) {
      throw new Error(`Task ${this.id} has already finished`);
    }
    if (!this.steps) {
      this.steps = this.execute();
    }

    const next = await this.steps.next();
    if (next.done) {
      this.finished = true;
      throw new Error(`Task ${this.id} ended without a terminal outcome`);
    }
    if (next.value.kind !== "progress") {
      this.finished = true;
    }
    return next.value;
  }

  /**
   * Issue one probe outside the step sequence. Never throws; failures are
   * returned as outcomes.
   */
  async probeOnce(): Promise<TaskOutcome> {
    const identity = this.resource.identity;
    if (identity === undefined) {
      return {
        kind: "failed",
        error: new NotFoundError(`Cannot probe ${this.resource.name}, resource has no identity`),
      };
    }

    this._probeCount++;
    let result: PollResult;
    try {
      result = await this.invokeProbe(() =>
        this.resource.backend.probeStatus(identity, this.action),
      );
    } catch (error) {
      if (isNotFound(error)) {
        return this.action === "DELETE"
          ? { kind: "complete", alreadyGone: true }
          : {
              kind: "failed",
              error: new NotFoundError(
                `Resource ${this.resource.name} disappeared during ${this.action.toLowerCase()}`,
              ),
            };
      }
      return { kind: "failed", error: toEngineError(error) };
    }

    this._lastStatus = result.status;
    switch (classifyStatus(this.action, result.status)) {
      case "IN_PROGRESS":
        return { kind: "progress", status: result.status };
      case "COMPLETE":
        return { kind: "complete", status: result.status };
      case "FAILED":
        return {
          kind: "failed",
          status: result.status,
          error: new ResourceInError(result.status, result.reason ?? "Unknown"),
        };
      case "UNKNOWN":
        return {
          kind: "failed",
          status: result.status,
          error: new ResourceUnknownStatusError(result.status),
        };
    }
  }

  /**
   * Release the step sequence; safe to call more than once.
   */
  async close(): Promise<void> {
    this.finished = true;
    if (this.steps) {
      await this.steps.return(undefined);
      this.steps = null;
    }
  }

  private async *execute(): AsyncGenerator<TaskOutcome, void, void> {
    if (this.plan.mutate) {
      this._mutatingCalls++;
      try {
        await this.plan.mutate();
      } catch (error) {
        if (this.action === "DELETE" && isNotFound(error)) {
          yield { kind: "complete", alreadyGone: true };
        } else {
          yield { kind: "failed", error: toEngineError(error) };
        }
        return;
      }
    }

    if (!this.plan.poll) {
      yield { kind: "complete" };
      return;
    }

    for (;;) {
      const outcome = await this.probeOnce();
      yield outcome;
      if (outcome.kind !== "progress") return;
    }
  }
}
