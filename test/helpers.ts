/**
 * Shared test doubles
 */

import { vi } from "vitest";
import { z } from "zod";
import type { EngineLogger } from "../src/logging/logger.js";
import type {
  BackendContext,
  ResourceBackend,
  ResourceTypeDefinition,
} from "../src/polling/protocol.js";
import type {
  LifecycleAction,
  PollResult,
  ResourceAttributes,
  ResourceProperties,
} from "../src/types.js";

// Mock logger
export const createMockLogger = (): EngineLogger => ({
  subsystem: "test",
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  child: () => createMockLogger(),
  withContext: () => createMockLogger(),
  setLevel: vi.fn(),
  getLevel: () => "info",
  isLevelEnabled: () => true,
  close: vi.fn().mockResolvedValue(undefined),
});

/**
 * One scripted probe answer: a bare status, a status with reason, or an
 * error to throw
 */
export type ScriptedProbe = string | PollResult | Error;

export type FakeCall = {
  method: string;
  args: unknown[];
  /** Global call order across every fake backend */
  seq: number;
};

let sequence = 0;

/**
 * In-memory backend whose probe answers are scripted per test
 */
export class FakeBackend implements ResourceBackend {
  readonly calls: FakeCall[] = [];
  probes: ScriptedProbe[] = [];
  nextIdentity = "remote-1";
  attributes: ResourceAttributes = { address: "10.0.0.1", size: 1 };
  failures: Partial<Record<"create" | "update" | "delete" | "suspend" | "resume", Error>> = {};
  /** Answer once the script is exhausted; defaults to `<ACTION>_COMPLETE` */
  fallbackStatus: ((action: LifecycleAction) => string) | null = null;
  /** Delay of every call, in ms */
  latencyMs = 0;
  /** Highest number of calls observed running at once */
  maxConcurrent = 0;
  private running = 0;

  constructor(probes: ScriptedProbe[] = []) {
    this.probes = probes;
  }

  count(method: string): number {
    return this.calls.filter((call) => call.method === method).length;
  }

  get mutatingCalls(): number {
    const readOnly = new Set(["probeStatus", "showAttributes"]);
    return this.calls.filter((call) => !readOnly.has(call.method)).length;
  }

  async createRemote(properties: ResourceProperties): Promise<string> {
    await this.record("createRemote", [properties]);
    this.throwIfFailing("create");
    return this.nextIdentity;
  }

  async updateRemote(
    identity: string,
    diff: ResourceProperties,
    properties: ResourceProperties,
  ): Promise<void> {
    await this.record("updateRemote", [identity, diff, properties]);
    this.throwIfFailing("update");
  }

  async deleteRemote(identity: string): Promise<void> {
    await this.record("deleteRemote", [identity]);
    this.throwIfFailing("delete");
  }

  async suspendRemote(identity: string): Promise<void> {
    await this.record("suspendRemote", [identity]);
    this.throwIfFailing("suspend");
  }

  async resumeRemote(identity: string): Promise<void> {
    await this.record("resumeRemote", [identity]);
    this.throwIfFailing("resume");
  }

  async probeStatus(identity: string, action: LifecycleAction): Promise<PollResult> {
    await this.record("probeStatus", [identity, action]);
    const next = this.probes.shift();
    if (next === undefined) {
      const status = this.fallbackStatus ? this.fallbackStatus(action) : `${action}_COMPLETE`;
      return { status, reason: null };
    }
    if (next instanceof Error) throw next;
    if (typeof next === "string") return { status: next, reason: null };
    return next;
  }

  async showAttributes(identity: string): Promise<ResourceAttributes> {
    await this.record("showAttributes", [identity]);
    return { ...this.attributes };
  }

  private async record(method: string, args: unknown[]): Promise<void> {
    this.calls.push({ method, args, seq: ++sequence });
    this.running++;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.running);
    try {
      if (this.latencyMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
      }
    } finally {
      this.running--;
    }
  }

  private throwIfFailing(operation: keyof FakeBackend["failures"]): void {
    const failure = this.failures[operation];
    if (failure) throw failure;
  }
}

export const fakePropertiesSchema = z.object({
  size: z.number().int().positive().default(1),
  zone: z.string().default("zone-a"),
  tags: z.array(z.string()).default([]),
});

export const FAKE_TYPE = "Test::Server";

/**
 * Resource type served by the given backend(s). `zone` cannot change in
 * place.
 */
export function createFakeType(
  backend: ResourceBackend | ((context: BackendContext) => ResourceBackend),
  overrides: Partial<ResourceTypeDefinition> = {},
): ResourceTypeDefinition {
  return {
    type: FAKE_TYPE,
    description: "Scripted test resource",
    schema: fakePropertiesSchema,
    replaceOnUpdate: ["zone"],
    attributes: ["address", "size"],
    createBackend: typeof backend === "function" ? backend : () => backend,
    ...overrides,
  };
}
