/**
 * Task Runner Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { FAKE_TYPE, FakeBackend, createFakeType, createMockLogger } from "../../test/helpers.js";
import {
  InvalidTransitionError,
  NotFoundError,
  ResourceFailure,
  TransportError,
} from "../errors.js";
import { EngineEventBus } from "../events.js";
import { ResourceStateMachine } from "../lifecycle/state-machine.js";
import type { ResourceInstance } from "../resources/instance.js";
import { ResourceTypeRegistry } from "../resources/registry.js";
import type { StateChangeEvent } from "../types.js";
import { TaskRunner, sleep } from "./task-runner.js";

async function captureFailure(promise: Promise<unknown>): Promise<ResourceFailure> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ResourceFailure) return error;
    throw error;
  }
  throw new Error("expected the action to fail");
}

describe("sleep", () => {
  it("should resolve true once the delay elapses", async () => {
    expect(await sleep(1)).toBe(true);
  });

  it("should resolve false when aborted", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    expect(await pending).toBe(false);
  });

  it("should resolve false immediately for an aborted signal", async () => {
    expect(await sleep(10_000, AbortSignal.abort())).toBe(false);
  });
});

describe("TaskRunner", () => {
  let backend: FakeBackend;
  let resource: ResourceInstance;
  let machine: ResourceStateMachine;
  let runner: TaskRunner;
  let changes: StateChangeEvent[];

  beforeEach(() => {
    backend = new FakeBackend();
    const registry = new ResourceTypeRegistry(createMockLogger());
    registry.register(createFakeType(backend));
    resource = registry.instantiate({
      name: "web",
      type: FAKE_TYPE,
      properties: {},
      physicalName: "stack-web",
    });

    const events = new EngineEventBus(createMockLogger());
    changes = [];
    events.on<StateChangeEvent>("resource:state-changed", (event) => {
      changes.push(event.data);
    });
    machine = new ResourceStateMachine(events, createMockLogger(), {
      probeRetry: { maxAttempts: 3, minDelayMs: 1, maxDelayMs: 1, jitterFactor: 0 },
    });
    runner = new TaskRunner({ pollIntervalMs: 1, defaultTimeoutMs: 5_000 }, machine, createMockLogger());
  });

  const created = async () => {
    await runner.run(machine.perform(resource, "CREATE"));
    backend.calls.length = 0;
  };

  describe("create", () => {
    it("should poll until complete and keep the backend's identity", async () => {
      backend.probes = ["CREATE_IN_PROGRESS", "CREATE_COMPLETE"];

      await runner.run(machine.perform(resource, "CREATE"));

      expect(resource.state).toEqual({ action: "CREATE", status: "COMPLETE" });
      expect(resource.identity).toBe("remote-1");
      expect(resource.inFlight).toBe(false);
      expect(backend.count("createRemote")).toBe(1);
      expect(backend.count("probeStatus")).toBe(2);
      expect(changes.map((c) => `${c.to.action}_${c.to.status}`)).toEqual([
        "CREATE_IN_PROGRESS",
        "CREATE_COMPLETE",
      ]);
    });

    it("should keep the identity after a remote failure and refuse to create again", async () => {
      backend.probes = [
        "CREATE_IN_PROGRESS",
        { status: "CREATE_FAILED", reason: "Remote stack creation failed" },
      ];

      const failure = await captureFailure(runner.run(machine.perform(resource, "CREATE")));

      expect(failure.message).toBe(
        'ResourceInError: Went to status CREATE_FAILED due to "Remote stack creation failed"',
      );
      expect(resource.state).toEqual({ action: "CREATE", status: "FAILED" });
      expect(resource.identity).toBe("remote-1");
      expect(() => machine.perform(resource, "CREATE")).toThrow(InvalidTransitionError);
    });

    it("should fail without an identity when the mutating call fails", async () => {
      backend.failures.create = new TransportError("quota exceeded", { statusCode: 413 });

      const failure = await captureFailure(runner.run(machine.perform(resource, "CREATE")));

      expect(failure.kind).toBe("TransportError");
      expect(resource.identity).toBeUndefined();
      expect(resource.state).toEqual({ action: "CREATE", status: "FAILED" });
      expect(backend.count("createRemote")).toBe(1);
      expect(backend.count("probeStatus")).toBe(0);
    });

    it("should retry a transient probe fault without repeating the mutating call", async () => {
      backend.probes = [new TransportError("unavailable", { statusCode: 503 }), "CREATE_COMPLETE"];

      await runner.run(machine.perform(resource, "CREATE"));

      expect(resource.state).toEqual({ action: "CREATE", status: "COMPLETE" });
      expect(backend.count("createRemote")).toBe(1);
      expect(backend.count("probeStatus")).toBe(2);
    });

    it("should fail on a probe fault that is not transient", async () => {
      backend.probes = [new TransportError("forbidden", { statusCode: 403 })];

      const failure = await captureFailure(runner.run(machine.perform(resource, "CREATE")));

      expect(failure.message).toBe("TransportError: forbidden");
      expect(backend.count("probeStatus")).toBe(1);
    });
  });

  describe("suspend / resume", () => {
    it("should report the remote reason of a failed suspend", async () => {
      await created();
      backend.probes = ["SUSPEND_IN_PROGRESS", { status: "SUSPEND_FAILED", reason: "disk full" }];

      const failure = await captureFailure(runner.run(machine.perform(resource, "SUSPEND")));

      expect(failure.message).toBe('ResourceInError: Went to status SUSPEND_FAILED due to "disk full"');
      expect(resource.state).toEqual({ action: "SUSPEND", status: "FAILED" });
      expect(resource.statusReason).toBe(failure.message);
    });

    it("should resume a suspended resource", async () => {
      await created();
      await runner.run(machine.perform(resource, "SUSPEND"));
      backend.probes = ["RESUME_IN_PROGRESS", "RESUME_COMPLETE"];

      await runner.run(machine.perform(resource, "RESUME"));

      expect(resource.state).toEqual({ action: "RESUME", status: "COMPLETE" });
      expect(backend.count("resumeRemote")).toBe(1);
    });
  });

  describe("delete", () => {
    it("should complete when the mutating call finds nothing", async () => {
      await created();
      backend.failures.delete = new NotFoundError("gone");

      await runner.run(machine.perform(resource, "DELETE"));

      expect(resource.state).toEqual({ action: "DELETE", status: "COMPLETE" });
      expect(backend.count("probeStatus")).toBe(0);
    });

    it("should complete when a probe finds nothing", async () => {
      await created();
      backend.probes = ["DELETE_IN_PROGRESS", new NotFoundError("gone")];

      await runner.run(machine.perform(resource, "DELETE"));

      expect(resource.state).toEqual({ action: "DELETE", status: "COMPLETE" });
    });

    it("should fail on a status of another action", async () => {
      await created();
      backend.probes = ["DELETE_IN_PROGRESS", "UPDATE_COMPLETE"];

      const failure = await captureFailure(runner.run(machine.perform(resource, "DELETE")));

      expect(failure.message).toBe("ResourceUnknownStatus: Resource failed - Unknown status UPDATE_COMPLETE");
      expect(resource.state).toEqual({ action: "DELETE", status: "FAILED" });
      expect(resource.identity).toBe("remote-1");
    });
  });

  describe("timeout", () => {
    it("should fail the action once the budget is spent", async () => {
      backend.fallbackStatus = (action) => `${action}_IN_PROGRESS`;

      const failure = await captureFailure(
        runner.run(machine.perform(resource, "CREATE"), { timeoutMs: 20 }),
      );

      expect(failure.message).toBe("Timeout: CREATE timed out after 20ms");
      expect(resource.state).toEqual({ action: "CREATE", status: "FAILED" });
      expect(resource.inFlight).toBe(false);
      expect(backend.count("createRemote")).toBe(1);
    });
  });

  describe("cancellation", () => {
    it("should probe once more and fail the action", async () => {
      backend.fallbackStatus = (action) => `${action}_IN_PROGRESS`;
      const controller = new AbortController();
      controller.abort();

      const failure = await captureFailure(
        runner.run(machine.perform(resource, "CREATE"), { signal: controller.signal }),
      );

      expect(failure.message).toBe(
        "Cancelled: CREATE cancelled (last remote status CREATE_IN_PROGRESS)",
      );
      expect(backend.count("createRemote")).toBe(1);
      expect(backend.count("probeStatus")).toBe(2);
      expect(resource.state).toEqual({ action: "CREATE", status: "FAILED" });
      expect(resource.inFlight).toBe(false);
    });

    it("should stop a running poll loop", async () => {
      backend.fallbackStatus = (action) => `${action}_IN_PROGRESS`;
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 15);

      const failure = await captureFailure(
        runner.run(machine.perform(resource, "CREATE"), { signal: controller.signal }),
      );

      expect(failure.kind).toBe("Cancelled");
      expect(resource.inFlight).toBe(false);
    });
  });
});
