/**
 * Resource store
 *
 * Arena owning every resource instance of one stack. Callers address
 * resources by name and receive snapshots; the live instance is only
 * handed to the state machine and the task runner.
 */

import { UnknownResourceError } from "../errors.js";
import type { EngineLogger } from "../logging/logger.js";
import type { ResourceInstance, ResourceSnapshot } from "./instance.js";
import type { ResourceTypeRegistry } from "./registry.js";

export class ResourceStore {
  private resources: Map<string, ResourceInstance> = new Map();

  constructor(
    readonly stackName: string,
    private registry: ResourceTypeRegistry,
    private logger: EngineLogger,
  ) {}

  physicalNameFor(name: string): string {
    return `${this.stackName}-${name}`;
  }

  add(name: string, type: string, properties: unknown): ResourceSnapshot {
    if (this.resources.has(name)) {
      throw new Error(`Resource already exists: ${name}`);
    }

    const instance = this.registry.instantiate({
      name,
      type,
      properties,
      physicalName: this.physicalNameFor(name),
    });
    this.resources.set(name, instance);
    this.logger.debug(`Resource added: ${name}`, { type });

    return instance.snapshot();
  }

  has(name: string): boolean {
    return this.resources.has(name);
  }

  /** @internal */
  get(name: string): ResourceInstance | undefined {
    return this.resources.get(name);
  }

  /** @internal Live instance for the lifecycle core */
  require(name: string): ResourceInstance {
    const instance = this.resources.get(name);
    if (!instance) throw new UnknownResourceError(name);
    return instance;
  }

  snapshot(name: string): ResourceSnapshot {
    return this.require(name).snapshot();
  }

  list(): ResourceSnapshot[] {
    return Array.from(this.resources.values(), (r) => r.snapshot());
  }

  remove(name: string): void {
    const instance = this.require(name);
    if (instance.inFlight) {
      throw new Error(`Cannot remove ${name} while an action is in progress`);
    }
    this.resources.delete(name);
    this.logger.debug(`Resource removed: ${name}`);
  }

  get size(): number {
    return this.resources.size;
  }
}
