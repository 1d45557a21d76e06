/**
 * Resource Type Registry
 *
 * Maps type names to resource type definitions and builds validated
 * resource instances from raw properties.
 */

import { PropertyValidationError, UnknownResourceTypeError } from "../errors.js";
import type { EngineLogger } from "../logging/logger.js";
import type { ResourceTypeDefinition } from "../polling/protocol.js";
import { ResourceInstance } from "./instance.js";

/**
 * Registered type entry
 */
export type ResourceTypeRegistration = {
  definition: ResourceTypeDefinition;
  registeredAt: Date;
};

export type InstantiateRequest = {
  name: string;
  type: string;
  properties: unknown;
  physicalName: string;
};

export class ResourceTypeRegistry {
  private types: Map<string, ResourceTypeRegistration> = new Map();

  constructor(private logger: EngineLogger) {}

  register(definition: ResourceTypeDefinition): void {
    if (this.types.has(definition.type)) {
      throw new Error(`Resource type already registered: ${definition.type}`);
    }

    this.types.set(definition.type, { definition, registeredAt: new Date() });
    this.logger.info(`Registered resource type: ${definition.type}`, {
      attributes: definition.attributes.length,
      replaceOnUpdate: [...definition.replaceOnUpdate],
    });
  }

  registerAll(definitions: readonly ResourceTypeDefinition[]): void {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  unregister(type: string): boolean {
    const removed = this.types.delete(type);
    if (removed) this.logger.info(`Unregistered resource type: ${type}`);
    return removed;
  }

  has(type: string): boolean {
    return this.types.has(type);
  }

  get(type: string): ResourceTypeDefinition {
    const registration = this.types.get(type);
    if (!registration) throw new UnknownResourceTypeError(type);
    return registration.definition;
  }

  list(): ResourceTypeRegistration[] {
    return Array.from(this.types.values());
  }

  /**
   * Validate raw properties against the type's schema and build an
   * instance in (INIT, COMPLETE).
   */
  instantiate(request: InstantiateRequest): ResourceInstance {
    const definition = this.get(request.type);
    const parsed = definition.schema.safeParse(request.properties);
    if (!parsed.success) {
      throw new PropertyValidationError(
        request.name,
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
      );
    }

    const backend = definition.createBackend({
      resourceName: request.name,
      physicalName: request.physicalName,
      properties: parsed.data,
      logger: this.logger.withContext({ resourceName: request.name }),
    });

    return new ResourceInstance(
      request.name,
      definition,
      backend,
      request.physicalName,
      parsed.data,
    );
  }
}
