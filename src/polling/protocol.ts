/**
 * Polling Protocol
 *
 * The capability interface a concrete resource type implements so the
 * lifecycle core can mutate the remote entity and observe its progress.
 * Types are composed from a property schema and a backend factory rather
 * than derived from a base class.
 */

import type { z } from "zod";
import type { EngineLogger } from "../logging/logger.js";
import type {
  LifecycleAction,
  PollResult,
  ResourceAttributes,
  ResourceProperties,
} from "../types.js";

/**
 * Collaborator boundary for one resource.
 *
 * Implementations signal a missing remote entity by throwing `NotFoundError`
 * and connectivity/HTTP faults by throwing `TransportError`.
 */
export interface ResourceBackend {
  /** Create the remote entity and return its identity */
  createRemote(properties: ResourceProperties): Promise<string>;
  /** Apply an in-place update */
  updateRemote(
    identity: string,
    diff: ResourceProperties,
    properties: ResourceProperties,
  ): Promise<void>;
  /** Delete the remote entity; `NotFoundError` means it is already gone */
  deleteRemote(identity: string): Promise<void>;
  suspendRemote?(identity: string): Promise<void>;
  resumeRemote?(identity: string): Promise<void>;
  /** Read-only status probe, called repeatedly until a terminal status */
  probeStatus(identity: string, action: LifecycleAction): Promise<PollResult>;
  /** Structured attributes for attribute lookups */
  showAttributes(identity: string): Promise<ResourceAttributes>;
  /** Optional pre-flight check, throws `ValidationFailedError` */
  validate?(properties: ResourceProperties): Promise<void>;
}

/**
 * What a backend factory knows about the resource it serves
 */
export type BackendContext = {
  resourceName: string;
  physicalName: string;
  /** Validated properties the resource was declared with */
  properties: Readonly<ResourceProperties>;
  logger: EngineLogger;
};

/**
 * Resource type definition, registered under `type`
 */
export type ResourceTypeDefinition = {
  type: string;
  description: string;
  schema: z.ZodType<ResourceProperties, z.ZodTypeDef, unknown>;
  /** Properties whose change cannot be applied in place */
  replaceOnUpdate: readonly string[];
  /** Attribute names `getAttribute` accepts; "show" is always accepted */
  attributes: readonly string[];
  createBackend(context: BackendContext): ResourceBackend;
};
