/**
 * Engine error types
 *
 * Every failure the core raises is an `EngineError` subclass carrying a
 * `kind` discriminant. Failures of a lifecycle action reach callers wrapped
 * in a `ResourceFailure` that names the resource and the action.
 */

import type { LifecycleAction, ResourceState } from "./types.js";

export type EngineErrorKind =
  | "NotFound"
  | "ReplacementRequired"
  | "TransportError"
  | "ResourceInError"
  | "ResourceUnknownStatus"
  | "Timeout"
  | "Cancelled"
  | "InvalidAttribute"
  | "InvalidTransition"
  | "ResourceBusy"
  | "ValidationFailed"
  | "PropertyValidation"
  | "UnknownResourceType"
  | "UnknownResource";

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;
}

/**
 * The remote entity does not exist (or no identity has been assigned yet).
 */
export class NotFoundError extends EngineError {
  readonly kind = "NotFound";

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/**
 * An update cannot be applied in place.
 */
export class ReplacementRequiredError extends EngineError {
  readonly kind = "ReplacementRequired";

  constructor(
    public readonly resourceName: string,
    public readonly properties: string[],
  ) {
    super(`Update of ${resourceName} requires replacement (changed: ${properties.join(", ")})`);
    this.name = "ReplacementRequiredError";
  }
}

/**
 * A collaborator call failed at the connectivity/HTTP level.
 */
export class TransportError extends EngineError {
  readonly kind = "TransportError";

  constructor(
    message: string,
    public readonly options: { statusCode?: number; code?: string; cause?: unknown } = {},
  ) {
    super(message);
    this.name = "TransportError";
  }

  get statusCode(): number | undefined {
    return this.options.statusCode;
  }

  get code(): string | undefined {
    return this.options.code;
  }
}

/**
 * The remote side reported its own FAILED terminal status.
 */
export class ResourceInError extends EngineError {
  readonly kind = "ResourceInError";

  constructor(
    public readonly status: string,
    public readonly reason: string,
  ) {
    super(`Went to status ${status} due to "${reason}"`);
    this.name = "ResourceInError";
  }
}

/**
 * The remote side reported a status the current action does not recognise.
 */
export class ResourceUnknownStatusError extends EngineError {
  readonly kind = "ResourceUnknownStatus";

  constructor(public readonly status: string) {
    super(`Resource failed - Unknown status ${status}`);
    this.name = "ResourceUnknownStatusError";
  }
}

export class ActionTimeoutError extends EngineError {
  readonly kind = "Timeout";

  constructor(
    public readonly action: LifecycleAction,
    public readonly timeoutMs: number,
  ) {
    super(`${action} timed out after ${timeoutMs}ms`);
    this.name = "ActionTimeoutError";
  }
}

export class ActionCancelledError extends EngineError {
  readonly kind = "Cancelled";

  constructor(
    public readonly action: LifecycleAction,
    public readonly lastStatus?: string,
  ) {
    super(
      lastStatus
        ? `${action} cancelled (last remote status ${lastStatus})`
        : `${action} cancelled`,
    );
    this.name = "ActionCancelledError";
  }
}

export class InvalidAttributeError extends EngineError {
  readonly kind = "InvalidAttribute";

  constructor(
    public readonly resourceName: string,
    public readonly attribute: string,
  ) {
    super(`The Referenced Attribute (${resourceName} ${attribute}) is incorrect.`);
    this.name = "InvalidAttributeError";
  }
}

export class InvalidTransitionError extends EngineError {
  readonly kind = "InvalidTransition";

  constructor(
    public readonly state: ResourceState,
    public readonly action: LifecycleAction,
  ) {
    super(`State (${state.action}, ${state.status}) invalid for ${action.toLowerCase()}`);
    this.name = "InvalidTransitionError";
  }
}

export class ResourceBusyError extends EngineError {
  readonly kind = "ResourceBusy";

  constructor(public readonly resourceName: string) {
    super(`Resource ${resourceName} already has an action in progress`);
    this.name = "ResourceBusyError";
  }
}

export class ValidationFailedError extends EngineError {
  readonly kind = "ValidationFailed";

  constructor(message: string) {
    super(message);
    this.name = "ValidationFailedError";
  }
}

export class PropertyValidationError extends EngineError {
  readonly kind = "PropertyValidation";

  constructor(
    public readonly resourceName: string,
    public readonly issues: string[],
  ) {
    super(`Invalid properties for ${resourceName}: ${issues.join("; ")}`);
    this.name = "PropertyValidationError";
  }
}

export class UnknownResourceTypeError extends EngineError {
  readonly kind = "UnknownResourceType";

  constructor(public readonly type: string) {
    super(`Unknown resource type: ${type}`);
    this.name = "UnknownResourceTypeError";
  }
}

export class UnknownResourceError extends EngineError {
  readonly kind = "UnknownResource";

  constructor(public readonly resourceName: string) {
    super(`Resource not found in store: ${resourceName}`);
    this.name = "UnknownResourceError";
  }
}

/**
 * Structured failure of one lifecycle action.
 *
 * Renders as `<Kind>: <cause message>`, e.g.
 * `ResourceInError: Went to status CREATE_FAILED due to "quota"`.
 */
export class ResourceFailure extends Error {
  constructor(
    public readonly resourceName: string,
    public readonly action: LifecycleAction,
    public readonly cause: EngineError,
  ) {
    super(`${cause.kind}: ${cause.message}`);
    this.name = "ResourceFailure";
  }

  get kind(): EngineErrorKind {
    return this.cause.kind;
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isNotFound(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/**
 * Coerce anything a collaborator threw into an engine error; foreign errors
 * are treated as transport faults.
 */
export function toEngineError(error: unknown): EngineError {
  if (error instanceof EngineError) return error;
  return new TransportError(formatErrorMessage(error), { cause: error });
}

/**
 * Format an unknown thrown value into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
