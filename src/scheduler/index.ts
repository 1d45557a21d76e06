/**
 * Scheduler exports
 */

export { Task, type TaskOutcome, type TaskPlan, type ProbeInvoker } from "./task.js";
export { TaskRunner, sleep, type RunOptions, type TaskRunnerOptions } from "./task-runner.js";
export { TaskScheduler, type SubmitOptions } from "./scheduler.js";
