/**
 * Lifecycle exports
 */

export {
  ResourceStateMachine,
  isTransitionAllowed,
  diffProperties,
  type PerformOptions,
  type StateMachineOptions,
} from "./state-machine.js";
