/**
 * Resource instance
 *
 * Holds the lifecycle record of one resource: its `(action, status)` pair,
 * its backend identity and its validated properties. Only the state
 * machine and the task runner call the mutators.
 */

import type { ResourceBackend, ResourceTypeDefinition } from "../polling/protocol.js";
import type {
  ResourceAction,
  ResourceProperties,
  ResourceState,
  ResourceStatus,
} from "../types.js";

/**
 * Read-only view handed to observers
 */
export type ResourceSnapshot = {
  readonly name: string;
  readonly type: string;
  readonly physicalName: string;
  readonly identity?: string;
  readonly action: ResourceAction;
  readonly status: ResourceStatus;
  readonly statusReason?: string;
  readonly inFlight: boolean;
  readonly properties: Readonly<ResourceProperties>;
  readonly updatedAt: Date;
};

export class ResourceInstance {
  readonly createdAt = new Date();
  private _identity?: string;
  private _action: ResourceAction = "INIT";
  private _status: ResourceStatus = "COMPLETE";
  private _statusReason?: string;
  private _inFlight = false;
  private _properties: ResourceProperties;
  private _updatedAt = this.createdAt;

  constructor(
    readonly name: string,
    readonly definition: ResourceTypeDefinition,
    readonly backend: ResourceBackend,
    readonly physicalName: string,
    properties: ResourceProperties,
  ) {
    this._properties = properties;
  }

  get type(): string {
    return this.definition.type;
  }

  get identity(): string | undefined {
    return this._identity;
  }

  get action(): ResourceAction {
    return this._action;
  }

  get status(): ResourceStatus {
    return this._status;
  }

  get state(): ResourceState {
    return { action: this._action, status: this._status };
  }

  /** Present iff status is FAILED */
  get statusReason(): string | undefined {
    return this._statusReason;
  }

  get inFlight(): boolean {
    return this._inFlight;
  }

  get properties(): Readonly<ResourceProperties> {
    return this._properties;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  /** @internal Identity is assigned once and never replaced. */
  assignIdentity(identity: string): void {
    if (this._identity !== undefined) {
      throw new Error(`Identity of ${this.name} is already set to ${this._identity}`);
    }
    this._identity = identity;
  }

  /** @internal Returns the state before the transition. */
  transition(action: ResourceAction, status: ResourceStatus, reason?: string): ResourceState {
    const previous = this.state;
    this._action = action;
    this._status = status;
    this._statusReason = status === "FAILED" ? reason ?? "Unknown" : undefined;
    this._updatedAt = new Date();
    return previous;
  }

  /** @internal */
  setInFlight(inFlight: boolean): void {
    this._inFlight = inFlight;
  }

  /** @internal */
  commitProperties(properties: ResourceProperties): void {
    this._properties = properties;
  }

  snapshot(): ResourceSnapshot {
    return {
      name: this.name,
      type: this.type,
      physicalName: this.physicalName,
      identity: this._identity,
      action: this._action,
      status: this._status,
      statusReason: this._statusReason,
      inFlight: this._inFlight,
      properties: structuredClone(this._properties),
      updatedAt: this._updatedAt,
    };
  }
}
