/**
 * Orchestration Engine
 *
 * Facade wiring configuration, logging, the type registry, the resource
 * store, the state machine, the task runner and the scheduler together.
 */

import type { z } from "zod";
import { EngineEventBus } from "./events.js";
import { ResourceStateMachine } from "./lifecycle/state-machine.js";
import { createEngineLogger, type EngineLogger } from "./logging/logger.js";
import type { ResourceTypeDefinition } from "./polling/protocol.js";
import type { ResourceSnapshot } from "./resources/instance.js";
import { ResourceTypeRegistry } from "./resources/registry.js";
import { ResourceStore } from "./resources/store.js";
import { TaskScheduler } from "./scheduler/scheduler.js";
import { TaskRunner } from "./scheduler/task-runner.js";
import type {
  EngineConfig,
  EngineEventHandler,
  EngineEventType,
  LifecycleAction,
  ResourceState,
} from "./types.js";
import { parseEngineConfig, type engineConfigSchema } from "./validation/config-validator.js";

/**
 * Raw configuration accepted by `createEngine`; every field has a default
 */
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export type EngineOptions = {
  config?: EngineConfigInput;
  /** Replaces the logger built from `config.logging`; the caller closes it */
  logger?: EngineLogger;
  resourceTypes?: readonly ResourceTypeDefinition[];
};

export type ActionOptions = {
  timeoutMs?: number;
};

export class OrchestrationEngine {
  readonly config: EngineConfig;
  private logger: EngineLogger;
  private ownsLogger: boolean;
  private events: EngineEventBus;
  private registry: ResourceTypeRegistry;
  private store: ResourceStore;
  private stateMachine: ResourceStateMachine;
  private scheduler: TaskScheduler;

  constructor(options: EngineOptions = {}) {
    this.config = parseEngineConfig(options.config ?? {});
    this.logger = options.logger ?? createEngineLogger("core", this.config.logging);
    this.ownsLogger = options.logger === undefined;

    this.events = new EngineEventBus(this.logger.child("events"));
    this.registry = new ResourceTypeRegistry(this.logger.child("registry"));
    this.store = new ResourceStore(
      this.config.stackName,
      this.registry,
      this.logger.child("store"),
    );
    this.stateMachine = new ResourceStateMachine(this.events, this.logger.child("lifecycle"), {
      probeRetry: this.config.scheduler.probeRetry,
    });
    const runner = new TaskRunner(
      {
        pollIntervalMs: this.config.scheduler.pollIntervalMs,
        defaultTimeoutMs: this.config.scheduler.defaultTimeoutMs,
      },
      this.stateMachine,
      this.logger.child("runner"),
    );
    this.scheduler = new TaskScheduler(
      this.store,
      this.stateMachine,
      runner,
      this.events,
      this.logger.child("scheduler"),
    );

    this.registry.registerAll(options.resourceTypes ?? []);
    this.logger.info("Engine ready", {
      stackName: this.config.stackName,
      resourceTypes: this.registry.list().length,
    });
  }

  // ===========================================================================
  // Types & Resources
  // ===========================================================================

  registerType(definition: ResourceTypeDefinition): void {
    this.registry.register(definition);
  }

  /**
   * Declare a resource; it starts in (INIT, COMPLETE) with no identity
   */
  addResource(name: string, type: string, properties: unknown = {}): ResourceSnapshot {
    return this.store.add(name, type, properties);
  }

  removeResource(name: string): void {
    this.store.remove(name);
  }

  getResource(name: string): ResourceSnapshot {
    return this.store.snapshot(name);
  }

  listResources(): ResourceSnapshot[] {
    return this.store.list();
  }

  getState(name: string): ResourceState {
    const { action, status } = this.store.snapshot(name);
    return { action, status };
  }

  // ===========================================================================
  // Lifecycle Actions
  // ===========================================================================

  create(name: string, options?: ActionOptions): Promise<ResourceSnapshot> {
    return this.perform(name, "CREATE", options);
  }

  update(name: string, properties: unknown, options?: ActionOptions): Promise<ResourceSnapshot> {
    return this.scheduler.submit(name, "UPDATE", { ...options, properties });
  }

  delete(name: string, options?: ActionOptions): Promise<ResourceSnapshot> {
    return this.perform(name, "DELETE", options);
  }

  suspend(name: string, options?: ActionOptions): Promise<ResourceSnapshot> {
    return this.perform(name, "SUSPEND", options);
  }

  resume(name: string, options?: ActionOptions): Promise<ResourceSnapshot> {
    return this.perform(name, "RESUME", options);
  }

  perform(
    name: string,
    action: LifecycleAction,
    options: ActionOptions = {},
  ): Promise<ResourceSnapshot> {
    return this.scheduler.submit(name, action, options);
  }

  cancel(name: string): number {
    return this.scheduler.cancel(name);
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  async validate(name: string): Promise<void> {
    await this.stateMachine.validate(this.store.require(name));
  }

  /**
   * Read an attribute of the remote entity; undefined until the resource
   * has an identity
   */
  getAttribute(name: string, attribute: string): Promise<unknown> {
    return this.stateMachine.getAttribute(this.store.require(name), attribute);
  }

  // ===========================================================================
  // Events & Shutdown
  // ===========================================================================

  on<T = unknown>(eventType: EngineEventType, handler: EngineEventHandler<T>): () => void {
    return this.scheduler.on(eventType, handler);
  }

  getActiveCount(): number {
    return this.scheduler.getActiveCount();
  }

  getQueuedCount(): number {
    return this.scheduler.getQueuedCount();
  }

  waitForIdle(): Promise<void> {
    return this.scheduler.waitForIdle();
  }

  async shutdown(): Promise<void> {
    this.logger.info("Shutting down engine");
    await this.scheduler.shutdown();
    this.events.clear();
    this.logger.info("Engine shutdown complete");
    if (this.ownsLogger) await this.logger.close();
  }
}

export function createEngine(options: EngineOptions = {}): OrchestrationEngine {
  return new OrchestrationEngine(options);
}
