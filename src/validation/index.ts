/**
 * Validation Module Index
 */

export {
  retryOptionsSchema,
  schedulerConfigSchema,
  logDestinationSchema,
  loggingConfigSchema,
  engineConfigSchema,
  validateEngineConfig,
  validateSchedulerConfig,
  parseEngineConfig,
  getDefaultEngineConfig,
  mergeWithDefaults,
} from "./config-validator.js";
