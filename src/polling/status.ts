/**
 * Remote status classification
 *
 * Backends report opaque status strings. The core only understands the
 * `<ACTION>_<PHASE>` convention, where PHASE is IN_PROGRESS, COMPLETE or
 * FAILED; everything else is UNKNOWN for the action in progress.
 */

import type {
  LifecycleAction,
  PollClassification,
  PollPhase,
  ResourceAction,
} from "../types.js";
import { RESOURCE_ACTIONS } from "../types.js";

const PHASES: readonly PollPhase[] = ["IN_PROGRESS", "COMPLETE", "FAILED"];

export function formatStatus(action: ResourceAction, phase: PollPhase): string {
  return `${action}_${phase}`;
}

/**
 * Classify a raw status against the action currently in progress.
 * A well-formed status belonging to another action is UNKNOWN.
 */
export function classifyStatus(action: LifecycleAction, status: string): PollClassification {
  for (const phase of PHASES) {
    if (status === formatStatus(action, phase)) return phase;
  }
  return "UNKNOWN";
}

/**
 * Split a raw status into its action and phase, or null when it does not
 * follow the convention.
 */
export function parseStatus(status: string): { action: ResourceAction; phase: PollPhase } | null {
  const separator = status.indexOf("_");
  if (separator <= 0) return null;

  const action = RESOURCE_ACTIONS.find((a) => a === status.slice(0, separator));
  const phase = PHASES.find((p) => p === status.slice(separator + 1));
  if (!action || !phase) return null;

  return { action, phase };
}

export function isTerminal(classification: PollClassification): boolean {
  return classification !== "IN_PROGRESS";
}
