/**
 * Remote Stack Resource Type Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createMockLogger } from "../../../test/helpers.js";
import { createEngine, type OrchestrationEngine } from "../../engine.js";
import { ReplacementRequiredError } from "../../errors.js";
import { createClientError } from "../client.js";
import {
  REMOTE_STACK_TYPE,
  createRemoteStackType,
  flattenOutputs,
  type OrchestrationClient,
  type RemoteStackRecord,
  type StackRequest,
} from "./remote-stack.js";

type ScriptedStatus = { status: string; reason?: string };

/**
 * Orchestration service kept in memory. Every action reports
 * `<ACTION>_IN_PROGRESS` once, then `outcome` (or `<ACTION>_COMPLETE`).
 */
class InMemoryOrchestrationClient implements OrchestrationClient {
  readonly stacks: Map<string, RemoteStackRecord> = new Map();
  readonly calls: string[] = [];
  readonly requests: Array<StackRequest & { stackName?: string }> = [];
  outcome: ScriptedStatus | null = null;
  vanishOnDelete = false;
  templateError: string | null = null;
  private pending: Map<string, ScriptedStatus[]> = new Map();
  private counter = 0;

  async createStack(request: StackRequest & { stackName: string }): Promise<{ id: string }> {
    this.calls.push("create");
    this.requests.push(request);
    const id = `stack-${++this.counter}`;
    this.stacks.set(id, {
      id,
      stack_name: request.stackName,
      stack_status: "INIT_COMPLETE",
      stack_status_reason: "",
      outputs: [],
    });
    this.begin(id, "CREATE");
    return { id };
  }

  async updateStack(stackId: string, request: StackRequest): Promise<void> {
    this.calls.push(`update ${stackId}`);
    this.requests.push(request);
    this.begin(stackId, "UPDATE");
  }

  async deleteStack(stackId: string): Promise<void> {
    this.calls.push(`delete ${stackId}`);
    this.begin(stackId, "DELETE");
    if (this.vanishOnDelete) this.stacks.delete(stackId);
  }

  async suspendStack(stackId: string): Promise<void> {
    this.calls.push(`suspend ${stackId}`);
    this.begin(stackId, "SUSPEND");
  }

  async resumeStack(stackId: string): Promise<void> {
    this.calls.push(`resume ${stackId}`);
    this.begin(stackId, "RESUME");
  }

  async getStack(stackId: string): Promise<RemoteStackRecord> {
    this.calls.push(`get ${stackId}`);
    const stack = this.lookup(stackId);
    const next = this.pending.get(stackId)?.shift();
    if (next) {
      stack.stack_status = next.status;
      stack.stack_status_reason = next.reason ?? "";
    }
    return { ...stack };
  }

  async validateTemplate(): Promise<void> {
    this.calls.push("validate");
    if (this.templateError) throw createClientError(400, this.templateError);
  }

  private begin(stackId: string, action: string): void {
    this.lookup(stackId);
    const terminal = this.outcome ?? { status: `${action}_COMPLETE` };
    this.outcome = null;
    this.pending.set(stackId, [{ status: `${action}_IN_PROGRESS` }, terminal]);
  }

  private lookup(stackId: string): RemoteStackRecord {
    const stack = this.stacks.get(stackId);
    if (!stack) throw createClientError(404, `The Stack (${stackId}) could not be found.`);
    return stack;
  }
}

describe("flattenOutputs", () => {
  it("should map output keys to values", () => {
    expect(
      flattenOutputs([
        { output_key: "url", output_value: "http://10.0.0.5" },
        { output_key: "port", output_value: 8080, description: "listener" },
      ]),
    ).toEqual({ url: "http://10.0.0.5", port: 8080 });
  });

  it("should return an empty map without outputs", () => {
    expect(flattenOutputs(null)).toEqual({});
  });
});

describe("remote stack resource type", () => {
  let client: InMemoryOrchestrationClient;
  let regions: string[];
  let unreachable: Set<string>;
  let engine: OrchestrationEngine;

  beforeEach(() => {
    client = new InMemoryOrchestrationClient();
    regions = [];
    unreachable = new Set();
    engine = createEngine({
      config: { stackName: "prod", scheduler: { pollIntervalMs: 1 } },
      logger: createMockLogger(),
      resourceTypes: [
        createRemoteStackType({
          defaultRegion: "region-one",
          clientForRegion: (region) => {
            regions.push(region);
            if (unreachable.has(region)) throw new Error("connection refused");
            return client;
          },
        }),
      ],
    });
  });

  const createChild = async (properties: Record<string, unknown> = {}) => {
    engine.addResource("child", REMOTE_STACK_TYPE, { template: "tmpl-v1", ...properties });
    return engine.create("child");
  };

  describe("create", () => {
    it("should create the stack under the physical name and poll it", async () => {
      const snapshot = await createChild({ parameters: { size: 2 } });

      expect(snapshot).toMatchObject({ identity: "stack-1", action: "CREATE", status: "COMPLETE" });
      expect(client.requests[0]).toEqual({
        stackName: "prod-child",
        template: "tmpl-v1",
        parameters: { size: 2 },
        files: {},
        timeoutMins: undefined,
        disableRollback: true,
      });
      expect(client.calls).toEqual(["create", "get stack-1", "get stack-1"]);
      expect(regions).toEqual(["region-one"]);
    });

    it("should send the configured environment with create and update", async () => {
      const environment = { parameter_defaults: { flavor: "small" } };
      engine = createEngine({
        config: { stackName: "prod", scheduler: { pollIntervalMs: 1 } },
        logger: createMockLogger(),
        resourceTypes: [
          createRemoteStackType({
            defaultRegion: "region-one",
            clientForRegion: () => client,
            environment,
          }),
        ],
      });

      await createChild();
      await engine.update("child", { template: "tmpl-v2" });

      expect(client.requests.map((request) => request.environment)).toEqual([
        environment,
        environment,
      ]);
    });

    it("should connect to the region named in the context", async () => {
      await createChild({ context: { region_name: "region-two" } });

      expect(regions).toEqual(["region-two"]);
    });

    it("should report the remote failure reason", async () => {
      client.outcome = { status: "CREATE_FAILED", reason: "Remote stack creation failed" };

      await expect(createChild()).rejects.toThrow(
        'ResourceInError: Went to status CREATE_FAILED due to "Remote stack creation failed"',
      );
      expect(engine.getResource("child")).toMatchObject({
        action: "CREATE",
        status: "FAILED",
        identity: "stack-1",
      });
    });

    it("should fall back to Unknown when the remote gives no reason", async () => {
      client.outcome = { status: "CREATE_FAILED", reason: "" };

      await expect(createChild()).rejects.toThrow(
        'ResourceInError: Went to status CREATE_FAILED due to "Unknown"',
      );
    });

    it("should fail when the region cannot be reached", async () => {
      unreachable.add("region-two");

      await expect(createChild({ context: { region_name: "region-two" } })).rejects.toThrow(
        "TransportError: connection refused",
      );
      expect(engine.getResource("child").identity).toBeUndefined();
    });
  });

  describe("update", () => {
    it("should send the full template and parameters in place", async () => {
      await createChild();

      const snapshot = await engine.update("child", { template: "tmpl-v2" });

      expect(snapshot).toMatchObject({ action: "UPDATE", status: "COMPLETE" });
      expect(client.requests[1]).toEqual({
        template: "tmpl-v2",
        parameters: {},
        files: {},
        timeoutMins: undefined,
        disableRollback: true,
      });
      expect(client.calls.slice(3)).toEqual(["update stack-1", "get stack-1", "get stack-1"]);
    });

    it("should require replacement when the region changes", async () => {
      await createChild();

      await expect(
        engine.update("child", { template: "tmpl-v1", context: { region_name: "region-two" } }),
      ).rejects.toThrow(new ReplacementRequiredError("child", ["context"]));
      expect(engine.getState("child")).toEqual({ action: "CREATE", status: "COMPLETE" });
      expect(engine.getResource("child").properties).toEqual({
        template: "tmpl-v1",
        parameters: {},
        files: {},
      });
      expect(client.calls).not.toContain("update stack-1");
    });

    it("should fail on a status of another action", async () => {
      await createChild();
      client.outcome = { status: "ROLLBACK_COMPLETE" };

      await expect(engine.update("child", { template: "tmpl-v2" })).rejects.toThrow(
        "ResourceUnknownStatus: Resource failed - Unknown status ROLLBACK_COMPLETE",
      );
      expect(engine.getResource("child").properties).toEqual({
        template: "tmpl-v1",
        parameters: {},
        files: {},
      });
    });
  });

  describe("suspend / resume / delete", () => {
    it("should suspend and resume the stack", async () => {
      await createChild();

      await engine.suspend("child");
      const snapshot = await engine.resume("child");

      expect(snapshot).toMatchObject({ action: "RESUME", status: "COMPLETE" });
      expect(client.calls).toContain("suspend stack-1");
      expect(client.calls).toContain("resume stack-1");
    });

    it("should complete a delete once the stack reports DELETE_COMPLETE", async () => {
      await createChild();

      await expect(engine.delete("child")).resolves.toMatchObject({
        action: "DELETE",
        status: "COMPLETE",
      });
    });

    it("should complete a delete when the stack is already gone", async () => {
      await createChild();
      client.vanishOnDelete = true;

      await engine.delete("child");

      expect(engine.getState("child")).toEqual({ action: "DELETE", status: "COMPLETE" });
      expect(client.calls.slice(3)).toEqual(["delete stack-1", "get stack-1"]);
    });
  });

  describe("attributes", () => {
    it("should expose the stack name and flattened outputs", async () => {
      await createChild();
      const stack = client.stacks.get("stack-1");
      if (stack) stack.outputs = [{ output_key: "url", output_value: "http://10.0.0.5" }];

      expect(await engine.getAttribute("child", "outputs")).toEqual({ url: "http://10.0.0.5" });
      expect(await engine.getAttribute("child", "stack_name")).toBe("prod-child");
    });
  });

  describe("validate", () => {
    it("should report an unreachable region", async () => {
      unreachable.add("region-two");
      engine.addResource("child", REMOTE_STACK_TYPE, {
        template: "tmpl-v1",
        context: { region_name: "region-two" },
      });

      await expect(engine.validate("child")).rejects.toThrow(
        'Cannot establish connection to orchestration endpoint at region "region-two" ' +
          'due to "connection refused"',
      );
    });

    it("should report a rejected template", async () => {
      client.templateError = "Unknown resource type Test::Nothing";
      engine.addResource("child", REMOTE_STACK_TYPE, { template: "tmpl-v1" });

      await expect(engine.validate("child")).rejects.toThrow(
        'Failed validating stack template using orchestration endpoint at region "region-one" ' +
          'due to "Unknown resource type Test::Nothing"',
      );
    });

    it("should pass a valid template", async () => {
      engine.addResource("child", REMOTE_STACK_TYPE, { template: "tmpl-v1" });

      await expect(engine.validate("child")).resolves.toBeUndefined();
      expect(client.calls).toEqual(["validate"]);
    });
  });
});
